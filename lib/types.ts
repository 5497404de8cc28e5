import { z } from "zod";

export const OPERATION_NAMES = [
	"addition",
	"subtraction",
	"multiplication",
	"division",
] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

export const OperationResultSchema = z.object({
	result: z.number(),
	operation: z.enum(OPERATION_NAMES),
	timestamp: z.string(),
});

export type OperationResult = z.infer<typeof OperationResultSchema>;

export const OperationHistorySchema = z.object({
	operations: z.array(OperationResultSchema),
});

export type OperationHistory = z.infer<typeof OperationHistorySchema>;

// Operands as they arrive from a tool call
export const OperandsShape = {
	num1: z.number().describe("First number"),
	num2: z.number().describe("Second number"),
};

export type Operands = { num1: number; num2: number };

export type Clock = () => Date;
