import { z } from "zod";
import { ConfigError } from "./errors";

const SIX_HOURS_MS = 1_000 * 60 * 60 * 6;

const ServerEnvSchema = z.object({
	SERVER_VERSION: z.string().min(1).default("1.0.0"),
});

const HttpEnvSchema = ServerEnvSchema.extend({
	PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
	HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(SIX_HOURS_MS),
});

type Env = Record<string, string | undefined>;

export type ServerConfig = {
	serverVersion: string;
};

export type HttpConfig = ServerConfig & {
	port: number;
	httpTimeoutMs: number;
};

/**
 * Settings every transport needs. HTTP-only keys are not read, so a bad
 * `PORT` cannot stop the stdio server.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
	const parsed = parseEnv(ServerEnvSchema, {
		SERVER_VERSION: blankToUndefined(env.SERVER_VERSION),
	});
	return { serverVersion: parsed.SERVER_VERSION };
}

/**
 * Settings for the HTTP transport. Every setting is optional; a value that
 * is present but malformed throws a {@link ConfigError}.
 */
export function loadHttpConfig(env: Env = process.env): HttpConfig {
	const parsed = parseEnv(HttpEnvSchema, {
		SERVER_VERSION: blankToUndefined(env.SERVER_VERSION),
		PORT: blankToUndefined(env.PORT),
		HTTP_TIMEOUT_MS: blankToUndefined(env.HTTP_TIMEOUT_MS),
	});
	return {
		serverVersion: parsed.SERVER_VERSION,
		port: parsed.PORT,
		httpTimeoutMs: parsed.HTTP_TIMEOUT_MS,
	};
}

function parseEnv<Output>(
	schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
	values: Env,
): Output {
	const parsed = schema.safeParse(values);
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		);
	}
	return parsed.data;
}

const blankToUndefined = (value: string | undefined) =>
	value === undefined || value.trim() === "" ? undefined : value;
