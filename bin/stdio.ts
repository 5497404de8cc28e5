import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config } from "dotenv";
import { loadConfig } from "../lib/config";
import { getLogger } from "../lib/logger";
import { OperationService } from "../lib/operation-service";
import { createServer } from "../server";

config({ quiet: true });

const logger = getLogger("stdio");

async function runServer() {
	const { serverVersion } = loadConfig();
	const server = createServer(new OperationService(), {
		version: serverVersion,
	});
	const transport = new StdioServerTransport();

	await server.connect(transport);
	logger.info("Maths operations server is ready on stdio");
}

runServer().catch((error: unknown) => {
	logger.error("Failed to start", error);
	process.exitCode = 1;
});
