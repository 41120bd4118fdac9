import fs from "node:fs";
import process from "node:process";
import { COLOR_CODES, ENABLE_COLOR, type ColorCode } from "../config/constants.js";

const LOG_FILE = process.env["LOG_FILE"];
let logStream: fs.WriteStream | undefined;

if (LOG_FILE) {
  logStream = fs.createWriteStream(LOG_FILE, { flags: "a" });
}

export function writeToLogFile(message: string): void {
  if (logStream) {
    const timestamp = new Date().toISOString();
    logStream.write(`[${timestamp}] ${message}\n`);
  }
}

/**
 * Flush and close the `LOG_FILE` stream. Later writes are dropped.
 */
export function closeLogFile(): Promise<void> {
  const stream = logStream;
  logStream = undefined;
  if (!stream) return Promise.resolve();
  return new Promise((resolve) => {
    stream.end(() => resolve());
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function colorize(message: string, color: ColorCode | undefined): string {
  if (!ENABLE_COLOR || !color) {
    return message;
  }
  return `${color}${message}${COLOR_CODES.reset}`;
}

type ConsoleMethod = "log" | "error";

export interface Logger {
  (message: string, ...rest: unknown[]): void;
}

export function makeLogger(
  method: ConsoleMethod,
  color: ColorCode | undefined,
  isDebugOnly: boolean,
  debugMode: boolean
): Logger {
  return (message: string, ...rest: unknown[]): void => {
    const fullMessage =
      rest.length > 0 ? `${message} ${rest.join(" ")}` : message;
    writeToLogFile(fullMessage);

    if (!isDebugOnly || debugMode) {
      if (rest.length > 0) {
        console[method](colorize(message, color), ...rest);
      } else {
        console[method](colorize(message, color));
      }
    }
  };
}

export interface Loggers {
  infoLog: Logger;
  debugLog: Logger;
  errorLog: Logger;
}

export function createLoggers(debugMode: boolean): Loggers {
  return {
    infoLog: makeLogger("log", COLOR_CODES.info, false, debugMode),
    debugLog: makeLogger("log", COLOR_CODES.info, true, debugMode),
    errorLog: makeLogger("error", COLOR_CODES.error, false, debugMode),
  };
}
