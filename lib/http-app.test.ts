import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createServer } from "../server";
import { createHttpApp } from "./http-app";
import { OperationService } from "./operation-service";

const TIMESTAMP = "2025-01-15T10:00:00.000Z";

const BAD_SESSION = {
	jsonrpc: "2.0",
	error: {
		code: -32_000,
		message: "Bad request: no valid session ID provided",
	},
	id: null,
};

const listTools = JSON.stringify({
	jsonrpc: "2.0",
	id: 1,
	method: "tools/list",
});

describe("createHttpApp", () => {
	let httpServer: Server;
	let baseUrl: string;
	let clients: Client[];

	beforeEach(async () => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		clients = [];
		const service = new OperationService({
			clock: () => new Date(TIMESTAMP),
		});
		const app = createHttpApp({
			createServer: () => createServer(service),
			sseTimeoutMs: 60_000,
		});

		httpServer = await new Promise<Server>((resolve) => {
			const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
		});
		const address = httpServer.address();
		if (address === null || typeof address === "string") {
			throw new Error("expected a TCP address");
		}
		baseUrl = `http://127.0.0.1:${address.port}`;
	});

	afterEach(async () => {
		await Promise.all(clients.map((client) => client.close()));
		httpServer.closeAllConnections();
		await new Promise<void>((resolve, reject) => {
			httpServer.close((error) => (error ? reject(error) : resolve()));
		});
	});

	const connect = async () => {
		const transport = new StreamableHTTPClientTransport(
			new URL(`${baseUrl}/mcp`),
		);
		const client = new Client({ name: "test-client", version: "1.0.0" });
		await client.connect(transport);
		clients.push(client);
		return { client, transport };
	};

	it("opens a session on initialize", async () => {
		const { client, transport } = await connect();

		expect(transport.sessionId).toEqual(expect.any(String));
		const { tools } = await client.listTools();
		expect(tools).toHaveLength(5);
	});

	it("shares one history between sessions", async () => {
		const first = await connect();
		const second = await connect();
		expect(first.transport.sessionId).not.toBe(second.transport.sessionId);

		await first.client.callTool({
			name: "add_numbers",
			arguments: { num1: 1, num2: 1 },
		});
		await second.client.callTool({
			name: "multiply_numbers",
			arguments: { num1: 2, num2: 2 },
		});

		const response = await second.client.callTool({
			name: "get_math_history",
		});
		expect(response.structuredContent).toEqual({
			operations: [
				{ result: 2, operation: "addition", timestamp: TIMESTAMP },
				{ result: 4, operation: "multiplication", timestamp: TIMESTAMP },
			],
		});
	});

	it("rejects a non-initialize POST without a session", async () => {
		const response = await fetch(`${baseUrl}/mcp`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: listTools,
		});

		expect(response.status).toBe(400);
		expect(await response.json()).toEqual(BAD_SESSION);
	});

	it("rejects a POST with an unknown session", async () => {
		const response = await fetch(`${baseUrl}/mcp`, {
			method: "POST",
			headers: {
				"content-type": "application/json",
				"mcp-session-id": "unknown-session",
			},
			body: listTools,
		});

		expect(response.status).toBe(400);
		expect(await response.json()).toEqual(BAD_SESSION);
	});

	it.each(["GET", "DELETE"])(
		"rejects %s /mcp with an unknown session",
		async (method) => {
			const response = await fetch(`${baseUrl}/mcp`, {
				method,
				headers: { "mcp-session-id": "unknown-session" },
			});

			expect(response.status).toBe(400);
			expect(await response.json()).toEqual(BAD_SESSION);
		},
	);

	it("forgets a session once it is terminated", async () => {
		const { transport } = await connect();
		const sessionId = transport.sessionId;
		if (sessionId === undefined) {
			throw new Error("expected a session id");
		}

		await transport.terminateSession();

		const response = await fetch(`${baseUrl}/mcp`, {
			method: "POST",
			headers: {
				"content-type": "application/json",
				"mcp-session-id": sessionId,
			},
			body: listTools,
		});
		expect(response.status).toBe(400);
	});

	it("rejects a legacy message for an unknown SSE session", async () => {
		const response = await fetch(`${baseUrl}/messages?sessionId=unknown`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: listTools,
		});

		expect(response.status).toBe(400);
		expect(await response.text()).toBe("No transport found for sessionId");
	});
});
