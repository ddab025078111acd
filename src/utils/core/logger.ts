/**
 * Console and File Logger
 *
 * Leveled logger shared by every stage of the pipeline:
 * - Colored console output per level (chalk)
 * - Optional plain-text log file, attached at runtime with `toFile()`
 * - A source stack: `withSource()` names the component that emitted each line,
 *   so nested calls (job → step → classifier → oracle) log under the innermost name
 *
 * The pipeline runs strictly sequentially, so one source stack per logger is enough.
 */

import type { WriteStream } from "fs";
import { createWriteStream } from "fs";
import { dirname } from "path";

import chalk from "chalk";

import { ensureFolder } from "../io/file.js";

export enum LogLevel {
    ERROR,
    WARN,
    SUCCESS,
    INFO,
    DEBUG,
}

/** Parse a level name such as "warn" or "DEBUG"; unknown names fall back to INFO. */
export const parseLogLevel = (name?: string): LogLevel => {
    switch (name?.trim().toLowerCase()) {
        case "error":
            return LogLevel.ERROR;
        case "warn":
        case "warning":
            return LogLevel.WARN;
        case "success":
            return LogLevel.SUCCESS;
        case "debug":
            return LogLevel.DEBUG;
        default:
            return LogLevel.INFO;
    }
};

class LoggerError extends Error {
    override name = "Logger.Error";
    constructor(message: string, source?: string) {
        super(`${source ? `${source}: ` : ""}${message}`);
    }
}

export class Logger {
    static Error = LoggerError;
    static FileError = class extends LoggerError {
        override name = "Logger.FileError";
    };

    #file?: WriteStream;
    #filePath?: string;
    readonly #sources: string[] = [];
    verbosity: LogLevel;

    readonly format = (message: string, level: string, source?: string) => {
        const from = source ?? this.source;
        return `${level ? `[${level}] ` : ""}${from ? `${from}: ` : ""}${message}`;
    };
    readonly prefixed = (prefix: string, mtd: string) => `${prefix}#${mtd}`;

    constructor(verbosity = LogLevel.INFO, file?: string) {
        this.verbosity = verbosity;
        if (file) {
            this.toFile(file);
        }
    }

    /** Path of the attached log file, if any. */
    get filePath() {
        return this.#filePath;
    }

    /** Mirror every line (regardless of verbosity) into a file. */
    toFile(path: string) {
        if (this.#file) {
            throw new Logger.FileError(`Already logging to ${this.#filePath}`, "Logger#toFile");
        }
        ensureFolder(dirname(path));
        this.#file = createWriteStream(path, { flags: "a+", encoding: "utf-8" });
        this.#filePath = path;
        return path;
    }

    /** Flush and detach the log file. */
    close() {
        const file = this.#file;
        this.#file = undefined;
        this.#filePath = undefined;
        if (!file) {
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => file.end(resolve));
    }

    #logFile(message: string) {
        this.#file?.write(`${new Date().toISOString()} ${message}\n`);
    }

    /** The innermost source set by `withSource`, if any. */
    get source(): string | undefined {
        return this.#sources[this.#sources.length - 1];
    }

    withSource<T>(source: string, func: () => Promise<T>): Promise<T>;
    withSource<T>(source: string, func: () => T): T;
    withSource<T>(prefix: string, method: string, func: () => Promise<T>): Promise<T>;
    withSource<T>(prefix: string, method: string, func: () => T): T;
    withSource<T>(
        sourceOrPrefix: string,
        funcOrMethod: (() => T | Promise<T>) | string,
        _func?: () => T | Promise<T>,
    ) {
        let source: string, func: () => T | Promise<T>;
        if (typeof funcOrMethod === "function") {
            // withSource(source, func)
            source = sourceOrPrefix;
            func = funcOrMethod;
        } else {
            // withSource(prefix, method, func)
            if (!_func) {
                throw new Logger.Error("func is required", "Logger#withSource");
            }
            source = this.prefixed(sourceOrPrefix, funcOrMethod);
            func = _func;
        }

        this.#sources.push(source);
        let result: T | Promise<T>;
        try {
            result = func();
        } catch (e) {
            this.#sources.pop();
            throw e;
        }
        if (result instanceof Promise) {
            return result.finally(() => {
                this.#sources.pop();
            });
        }
        this.#sources.pop();
        return result;
    }

    error(error?: unknown, recoverable = false, source?: string) {
        const message =
            error instanceof Error
                ? error.message
                : typeof error === "string"
                  ? error
                  : JSON.stringify(error);
        const formatted = this.format(message, "ERROR", source);
        const tb = error instanceof Error ? error.stack : undefined;
        const cause = error instanceof Error ? error.cause : undefined;

        console.error(chalk.red(formatted));
        this.#logFile(formatted);
        if (tb) {
            if (this.verbosity >= LogLevel.DEBUG) console.error(chalk.red(tb));
            this.#logFile(tb);
        }
        if (cause) {
            console.error(chalk.red("Caused by:"));
            this.#logFile("Caused by:");
            this.error(cause, true, source);
        }

        if (!recoverable) {
            if (error instanceof Error) {
                throw error;
            }
            throw new Error(message);
        }
    }

    warn(message: string, source?: string) {
        const formatted = this.format(message, "WARN", source);
        if (this.verbosity >= LogLevel.WARN) {
            console.warn(chalk.yellow(formatted));
        }
        this.#logFile(formatted);
    }

    success(message: string, source?: string) {
        const formatted = this.format(message, "SUCCESS", source);
        if (this.verbosity >= LogLevel.SUCCESS) {
            console.log(chalk.green(formatted));
        }
        this.#logFile(formatted);
    }

    info(message: string, source?: string) {
        const formatted = this.format(message, "INFO", source);
        if (this.verbosity >= LogLevel.INFO) {
            console.info(chalk.blue(formatted));
        }
        this.#logFile(formatted);
    }

    debug(message: string, source?: string) {
        const formatted = this.format(message, "DEBUG", source);
        if (this.verbosity >= LogLevel.DEBUG) {
            console.debug(chalk.gray(formatted));
        }
        this.#logFile(formatted);
    }
}

export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));
