import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import express, {
	type Express,
	type NextFunction,
	type Request,
	type Response,
} from "express";
import { randomUUID } from "node:crypto";
import { getLogger, type Logger } from "./logger";

export type HttpAppOptions = {
	/** Called once per session; every session needs its own server. */
	createServer: () => McpServer;
	/** Socket timeout for long-lived SSE streams. */
	sseTimeoutMs: number;
	logger?: Logger;
};

// NOTE sessions are stateful transport objects bound to open connections,
// so they live in memory and do not survive a restart.
type Transports = {
	sse: Record<string, SSEServerTransport>;
	streamable: Record<string, StreamableHTTPServerTransport>;
};

/**
 * Express app serving the MCP tools over streamable HTTP (`/mcp`) and the
 * legacy SSE transport (`/sse` + `/messages`).
 */
export function createHttpApp(options: HttpAppOptions): Express {
	const logger = options.logger ?? getLogger("HttpApp");
	const transports: Transports = { sse: {}, streamable: {} };

	const app = express();
	app.use(express.json());

	app.post("/mcp", async (req, res) => {
		const sessionId = sessionIdOf(req);
		let transport: StreamableHTTPServerTransport;

		const existing = sessionId ? transports.streamable[sessionId] : undefined;
		if (existing) {
			transport = existing;
		} else if (!sessionId && isInitializeRequest(req.body)) {
			const created = new StreamableHTTPServerTransport({
				sessionIdGenerator: randomUUID,
				onsessioninitialized(newSessionId) {
					transports.streamable[newSessionId] = created;
					logger.info("Streamable", newSessionId, "Session initialized");
				},
			});
			created.onclose = () => {
				if (created.sessionId) {
					delete transports.streamable[created.sessionId];
					logger.info("Streamable", created.sessionId, "Session closed");
				}
			};
			await options.createServer().connect(created);
			transport = created;
		} else {
			logger.warn("Streamable", sessionId, "No transport found for sessionId");
			res.status(400).json({
				jsonrpc: "2.0",
				error: {
					code: -32_000,
					message: "Bad request: no valid session ID provided",
				},
				id: null,
			});
			return;
		}

		await transport.handleRequest(req, res, req.body);
	});

	const handleSessionRequest = async (req: Request, res: Response) => {
		const sessionId = sessionIdOf(req);
		const transport = sessionId ? transports.streamable[sessionId] : undefined;
		if (!transport) {
			logger.warn("Streamable", sessionId, "No transport found for sessionId");
			res.status(400).json({
				jsonrpc: "2.0",
				error: {
					code: -32_000,
					message: "Bad request: no valid session ID provided",
				},
				id: null,
			});
			return;
		}
		await transport.handleRequest(req, res);
	};

	app.get("/mcp", handleSessionRequest);
	app.delete("/mcp", handleSessionRequest);

	app.get("/sse", async (_req, res) => {
		const transport = new SSEServerTransport("/messages", res);
		transports.sse[transport.sessionId] = transport;
		logger.info("SSE", transport.sessionId, "Stream opened");

		res.setTimeout(options.sseTimeoutMs);
		res.on("close", () => {
			delete transports.sse[transport.sessionId];
			logger.info("SSE", transport.sessionId, "Stream closed");
		});

		await options.createServer().connect(transport);
	});

	// Legacy message endpoint for older clients
	app.post("/messages", async (req, res) => {
		const sessionId =
			typeof req.query.sessionId === "string" ? req.query.sessionId : undefined;
		const transport = sessionId ? transports.sse[sessionId] : undefined;
		if (!transport) {
			logger.warn("SSE", sessionId, "No transport found for sessionId");
			res.status(400).send("No transport found for sessionId");
			return;
		}
		await transport.handlePostMessage(req, res, req.body);
	});

	app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
		logger.error("Unhandled error", error);
		if (res.headersSent) {
			logger.warn("headers already sent so no response sent");
			return;
		}
		res.status(500).json({
			jsonrpc: "2.0",
			error: {
				code: -32_603,
				message: "Internal server error",
			},
			id: null,
		});
	});

	return app;
}

function sessionIdOf(req: Request): string | undefined {
	const header = req.headers["mcp-session-id"];
	return typeof header === "string" && header !== "" ? header : undefined;
}
