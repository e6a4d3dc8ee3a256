import pino, { type Logger } from "pino";
import type { Config } from "./config/env";

/**
 * Create the process logger shared by Fastify and the domain services
 *
 * Pretty output goes through a pino-pretty transport; otherwise plain JSON lines.
 */
export function createLogger(config: Pick<Config, "logLevel" | "logPretty">): Logger {
    if (!config.logPretty) {
        return pino({ level: config.logLevel });
    }

    return pino({
        level: config.logLevel,
        transport: {
            target: "pino-pretty",
            options: {
                colorize: true,
                ignore: "pid,hostname",
                translateTime: "SYS:dd-mm-yyyy HH:MM:ss"
            }
        }
    });
}

export type { Logger };
