import type { OperationResult } from "./types";

/**
 * Append-only, in-memory log of successful operations in call order.
 *
 * Appends happen synchronously, so on Node's single thread a read can never
 * observe a half-written entry. Readers always get a copy.
 */
export class OperationHistoryStore {
	private readonly entries: OperationResult[] = [];

	public append(entry: OperationResult): void {
		this.entries.push(entry);
	}

	public list(): OperationResult[] {
		return [...this.entries];
	}

	public get size(): number {
		return this.entries.length;
	}
}
