export {
	type HttpConfig,
	loadConfig,
	loadHttpConfig,
	type ServerConfig,
} from "./lib/config";
export {
	ConfigError,
	DivisionByZeroError,
	InvalidInputError,
	MathsError,
	NonFiniteResultError,
	OperationError,
} from "./lib/errors";
export { createHttpApp, type HttpAppOptions } from "./lib/http-app";
export { getLogger, type Logger } from "./lib/logger";
export { OperationHistoryStore } from "./lib/operation-history";
export {
	OperationService,
	type OperationServiceOptions,
} from "./lib/operation-service";
export {
	OPERATION_NAMES,
	OperationHistorySchema,
	OperationResultSchema,
	type Clock,
	type Operands,
	type OperationHistory,
	type OperationName,
	type OperationResult,
} from "./lib/types";
export { createServer, SERVER_NAME, type CreateServerOptions } from "./server";
