import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { OperationError } from "./lib/errors";
import type { OperationService } from "./lib/operation-service";
import {
	OperandsShape,
	OperationHistorySchema,
	OperationResultSchema,
	type Operands,
	type OperationResult,
} from "./lib/types";

export const SERVER_NAME = "MathsOperationsServer";

export type CreateServerOptions = {
	version?: string;
};

/**
 * Builds an MCP server exposing the arithmetic tools over `service`.
 *
 * A server instance binds to a single transport, so HTTP sessions each get
 * their own; sharing one `service` between them shares the history.
 */
export function createServer(
	service: OperationService,
	options: CreateServerOptions = {},
): McpServer {
	const server = new McpServer({
		name: SERVER_NAME,
		version: options.version ?? "1.0.0",
	});

	const registerArithmetic = (
		name: string,
		description: string,
		run: (operands: Operands) => OperationResult,
	) => {
		server.registerTool(
			name,
			{
				description,
				inputSchema: OperandsShape,
				outputSchema: OperationResultSchema.shape,
			},
			async ({ num1, num2 }) => {
				try {
					return structured(run({ num1, num2 }));
				} catch (error) {
					if (error instanceof OperationError) {
						return {
							content: [{ type: "text", text: error.message }],
							isError: true,
						};
					}
					throw error;
				}
			},
		);
	};

	registerArithmetic("add_numbers", "Add two numbers.", (operands) =>
		service.add(operands),
	);
	registerArithmetic(
		"subtract_numbers",
		"Subtract second number from first number.",
		(operands) => service.subtract(operands),
	);
	registerArithmetic("multiply_numbers", "Multiply two numbers.", (operands) =>
		service.multiply(operands),
	);
	registerArithmetic(
		"divide_numbers",
		"Divide first number by second number. The divisor cannot be zero.",
		(operands) => service.divide(operands),
	);

	server.registerTool(
		"get_math_history",
		{
			description:
				"Retrieve the history of all performed mathematical operations.",
			outputSchema: OperationHistorySchema.shape,
		},
		async () => structured(service.getHistory()),
	);

	return server;
}

function structured(value: Record<string, unknown>): CallToolResult {
	return {
		content: [{ type: "text", text: JSON.stringify(value) }],
		structuredContent: value,
	};
}
