import { config } from "dotenv";
import { loadHttpConfig } from "../lib/config";
import { createHttpApp } from "../lib/http-app";
import { getLogger } from "../lib/logger";
import { OperationService } from "../lib/operation-service";
import { createServer } from "../server";

config({ quiet: true });

const logger = getLogger("http");
const { port, httpTimeoutMs, serverVersion } = loadHttpConfig();

// One service for the whole process: every session sees the same history
const service = new OperationService();

const app = createHttpApp({
	createServer: () => createServer(service, { version: serverVersion }),
	sseTimeoutMs: httpTimeoutMs,
});

const httpServer = app.listen(port, () => {
	logger.info(`Server is running on port ${port}`);
});

httpServer.setTimeout(httpTimeoutMs);
