import { Writable } from "node:stream";
import fs from "node:fs";
import { ExitCodes } from "./constants.js";

export type LogDetails = Record<string, unknown>;

// ===========================================================================
export function formatErr(e: unknown): LogDetails {
  if (e instanceof Error) {
    return { type: "exception", message: e.message, stack: e.stack || "" };
  } else if (typeof e === "object" && e !== null) {
    return Object.fromEntries(Object.entries(e));
  } else {
    return { message: String(e) };
  }
}

// ===========================================================================
export const LOG_CONTEXT_TYPES = [
  "general",
  "canonical",
  "links",
  "sessionTokens",
  "config",
] as const;

export type LogContext = (typeof LOG_CONTEXT_TYPES)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_EXCLUDE_LOG_CONTEXTS: LogContext[] = [];

// ===========================================================================
class Logger {
  debugLogging = false;
  logLevels: string[] = [];
  contexts: LogContext[] = [];
  excludeContexts: LogContext[] = [];
  fatalExitCode: ExitCodes = ExitCodes.Fatal;
  logFH: Writable | null = null;

  openLog(filename: string) {
    this.logFH = fs.createWriteStream(filename, { flags: "a" });
  }

  async closeLog(): Promise<void> {
    // close file-based log
    if (!this.logFH) {
      return;
    }
    const logFH = this.logFH;
    this.logFH = null;
    await streamFinish(logFH);
  }

  setDebugLogging(debugLog: boolean) {
    this.debugLogging = debugLog;
  }

  setLogLevel(logLevels: string[]) {
    this.logLevels = logLevels;
  }

  setContext(contexts: LogContext[]) {
    this.contexts = contexts;
  }

  setExcludeContext(contexts: LogContext[]) {
    this.excludeContexts = contexts;
  }

  logAsJSON(
    message: string,
    dataUnknown: unknown,
    context: LogContext,
    logLevel: LogLevel,
  ) {
    const data = formatErr(dataUnknown);

    if (this.logLevels.length) {
      if (this.logLevels.indexOf(logLevel) < 0) {
        return;
      }
    }

    if (this.contexts.length) {
      if (this.contexts.indexOf(context) < 0) {
        return;
      }
    }

    if (this.excludeContexts.length) {
      if (this.excludeContexts.indexOf(context) >= 0) {
        return;
      }
    }

    const dataToLog = {
      timestamp: new Date().toISOString(),
      logLevel: logLevel,
      context: context,
      message: message,
      details: data,
    };
    const string = JSON.stringify(dataToLog);
    console.log(string);
    if (this.logFH) {
      this.logFH.write(string + "\n");
    }
  }

  info(message: string, data: unknown = {}, context: LogContext = "general") {
    this.logAsJSON(message, data, context, "info");
  }

  error(message: string, data: unknown = {}, context: LogContext = "general") {
    this.logAsJSON(message, data, context, "error");
  }

  warn(message: string, data: unknown = {}, context: LogContext = "general") {
    this.logAsJSON(message, data, context, "warn");
  }

  debug(message: string, data: unknown = {}, context: LogContext = "general") {
    if (this.debugLogging) {
      this.logAsJSON(message, data, context, "debug");
    }
  }

  fatal(
    message: string,
    data = {},
    context: LogContext = "general",
    exitCode = ExitCodes.Success,
  ): never {
    exitCode = exitCode || this.fatalExitCode;
    this.logAsJSON(`${message}. Quitting`, data, context, "fatal");
    process.exit(exitCode);
  }
}

// =================================================================
export function streamFinish(fh: Writable) {
  const p = new Promise<void>((resolve) => {
    fh.once("finish", () => resolve());
  });
  fh.end();
  return p;
}

export const logger = new Logger();
