import type { OperationName } from "./types";

/**
 * Base class for failures raised while evaluating an operation.
 */
export class MathsError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class InvalidInputError extends MathsError {
	public readonly field: string;

	constructor(field: string) {
		super(`${field} must be a finite number`);
		this.field = field;
	}
}

export class DivisionByZeroError extends MathsError {
	constructor() {
		super("Division by zero is not allowed");
	}
}

export class NonFiniteResultError extends MathsError {
	constructor() {
		super("Result is not a finite number");
	}
}

/**
 * What a tool caller sees: the underlying reason prefixed with the operation,
 * e.g. "Division failed: Division by zero is not allowed".
 */
export class OperationError extends Error {
	public readonly operation: OperationName;
	public readonly cause: MathsError;

	constructor(operation: OperationName, cause: MathsError) {
		super(`${capitalize(operation)} failed: ${cause.message}`, { cause });
		this.name = "OperationError";
		this.operation = operation;
		this.cause = cause;
	}
}

export class ConfigError extends Error {
	public readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

const capitalize = (value: string): string =>
	value.charAt(0).toUpperCase() + value.slice(1);
