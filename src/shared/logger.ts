import fs from "fs";
import path from "path";
import { describeError } from "./errors.js";

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
};

type Level = "INFO" | "WARNING" | "ERROR";

const pad = (value: number) => String(value).padStart(2, "0");

export const formatTimestamp = (date: Date) =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

const withError = (message: string, error?: unknown) =>
  error === undefined ? message : `${message}: ${describeError(error)}`;

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message, error) => console.error(withError(message, error))
};

export type FileLoggerOptions = {
  filePath: string;
  maxBytes: number;
  backupCount: number;
  now?: () => Date;
};

const backupPath = (filePath: string, index: number) => `${filePath}.${index}`;

/**
 * Shifts `file` to `file.1`, `file.1` to `file.2` and so on, dropping whatever
 * would land past `backupCount`. With a backup count of 0 the file is truncated.
 */
const rotate = (filePath: string, backupCount: number) => {
  if (backupCount <= 0) {
    fs.truncateSync(filePath, 0);
    return;
  }
  const oldest = backupPath(filePath, backupCount);
  if (fs.existsSync(oldest)) {
    fs.unlinkSync(oldest);
  }
  for (let index = backupCount - 1; index >= 1; index -= 1) {
    const source = backupPath(filePath, index);
    if (fs.existsSync(source)) {
      fs.renameSync(source, backupPath(filePath, index + 1));
    }
  }
  fs.renameSync(filePath, backupPath(filePath, 1));
};

const currentSize = (filePath: string) => {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
};

export const createFileLogger = (options: FileLoggerOptions): Logger => {
  const { filePath, maxBytes, backupCount } = options;
  const now = options.now ?? (() => new Date());
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });

  const write = (level: Level, message: string) => {
    const line = `${formatTimestamp(now())} - ${level} - ${message}\n`;
    const size = currentSize(filePath);
    if (maxBytes > 0 && size > 0 && size + Buffer.byteLength(line) > maxBytes) {
      rotate(filePath, backupCount);
    }
    fs.appendFileSync(filePath, line, "utf-8");
  };

  return {
    info: (message) => write("INFO", message),
    warn: (message) => write("WARNING", message),
    error: (message, error) => {
      const stack = error instanceof Error && error.stack ? `\n${error.stack}` : "";
      write("ERROR", `${withError(message, error)}${stack}`);
    }
  };
};

export const teeLogger = (...loggers: Logger[]): Logger => ({
  info: (message) => loggers.forEach((logger) => logger.info(message)),
  warn: (message) => loggers.forEach((logger) => logger.warn(message)),
  error: (message, error) => loggers.forEach((logger) => logger.error(message, error))
});
