import {
	DivisionByZeroError,
	InvalidInputError,
	MathsError,
	NonFiniteResultError,
	OperationError,
} from "./errors";
import { getLogger, type Logger } from "./logger";
import { OperationHistoryStore } from "./operation-history";
import type {
	Clock,
	OperationHistory,
	OperationName,
	OperationResult,
	Operands,
} from "./types";

export type OperationServiceOptions = {
	history?: OperationHistoryStore;
	clock?: Clock;
	logger?: Logger;
};

/**
 * Validated arithmetic that records every successful result.
 *
 * Each call either returns a recorded {@link OperationResult} or throws an
 * {@link OperationError}; a failed call never touches the history.
 */
export class OperationService {
	private readonly history: OperationHistoryStore;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(options: OperationServiceOptions = {}) {
		this.history = options.history ?? new OperationHistoryStore();
		this.clock = options.clock ?? (() => new Date());
		this.logger = options.logger ?? getLogger("OperationService");
	}

	public add(operands: Operands): OperationResult {
		return this.perform("addition", operands, (a, b) => a + b);
	}

	public subtract(operands: Operands): OperationResult {
		return this.perform("subtraction", operands, (a, b) => a - b);
	}

	public multiply(operands: Operands): OperationResult {
		return this.perform("multiplication", operands, (a, b) => a * b);
	}

	public divide(operands: Operands): OperationResult {
		return this.perform("division", operands, (a, b) => {
			if (b === 0) {
				throw new DivisionByZeroError();
			}
			return a / b;
		});
	}

	public getHistory(): OperationHistory {
		return { operations: this.history.list() };
	}

	private perform(
		operation: OperationName,
		{ num1, num2 }: Operands,
		compute: (a: number, b: number) => number,
	): OperationResult {
		let value: number;
		try {
			assertFinite("num1", num1);
			assertFinite("num2", num2);
			value = compute(num1, num2);
			// overflow, e.g. 1e200 * 1e200
			if (!Number.isFinite(value)) {
				throw new NonFiniteResultError();
			}
		} catch (error) {
			if (error instanceof MathsError) {
				this.logger.warn(operation, "rejected:", error.message);
				throw new OperationError(operation, error);
			}
			throw error;
		}

		const entry: OperationResult = Object.freeze({
			result: value,
			operation,
			timestamp: this.clock().toISOString(),
		});
		this.history.append(entry);
		this.logger.debug(operation, num1, num2, "=", value);
		return entry;
	}
}

function assertFinite(field: string, value: number): void {
	if (!Number.isFinite(value)) {
		throw new InvalidInputError(field);
	}
}
