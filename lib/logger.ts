import createLogger from "logging";

export type Logger = ReturnType<typeof createLogger>;

/**
 * Everything goes to stderr: under the stdio transport stdout carries the
 * protocol stream and nothing else.
 */
export function getLogger(name: string): Logger {
	return createLogger(name, {
		logFunction: (...args) => {
			console.error(...args);
		},
		debugFunction: (...args) => {
			console.error(...args);
		},
	});
}
