import pino, { type Logger } from "pino";
import { resolveRuntime, type Runtime } from "../config/runtime.js";
import { isTestEnv } from "../util/env.js";
import { jsonStringifySafeBigint } from "./bigint.js";

export type { Logger };

export function createLogger(runtime: Runtime = resolveRuntime()): Logger {
    const options: pino.LoggerOptions = {
        base: undefined,
        level: isTestEnv() ? "silent" : runtime.logLevel,
        formatters: {
            level: (label) => ({ level: label }),
            // amounts are bigints; keep them exact in the ndjson output
            log: (obj) => JSON.parse(jsonStringifySafeBigint(obj)),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    if (!runtime.pretty || isTestEnv()) return pino(options);
    const transport = pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: true,
            ignore: "pid,hostname",
        },
    });
    return pino(options, transport);
}
