import { Config } from "../config";
import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";
import { Writable } from "stream";

const defaultLevel = process.env.NODE_ENV === "test" ? "silent" : "info";

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? defaultLevel,
  timestamp: stdTimeFunctions.isoTime,
  base: undefined,
  formatters: {
    level(label) {
      return { level: label.toUpperCase() };
    },
  },
};

type LogObject = {
  level?: string;
  time?: string;
  msg?: string;
  file?: string;
  [key: string]: unknown;
};

export function formatLogLine(text: string): string {
  let obj: LogObject;
  try {
    obj = JSON.parse(text);
  } catch {
    return text + "\n";
  }
  const level = typeof obj.level === "string" ? obj.level : "";
  const time = (typeof obj.time === "string" ? obj.time : "").replace(/\..*/, "");
  const file = (typeof obj.file === "string" ? obj.file : "").slice(0, 9);
  const msg = typeof obj.msg === "string" ? obj.msg : text;
  return `${level.padEnd(5)} ${time} ${file.padEnd(10)} ${msg}\n`;
}

class SimpleLineStream extends Writable {
  _write(chunk: Buffer, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const text = chunk.toString("utf8").trim();
    if (text.length > 0) {
      process.stderr.write(formatLogLine(text));
    }
    callback();
  }
}

function build(): Logger {
  if (Config.LOG_FORMAT === "simple") {
    return pino(options, new SimpleLineStream());
  }
  return pino(options, pino.destination(2));
}

type GlobalWithLogger = typeof globalThis & { __SITEMARK_LOGGER__?: Logger };
const g = globalThis as GlobalWithLogger;

export const logger: Logger = g.__SITEMARK_LOGGER__ ?? (g.__SITEMARK_LOGGER__ = build());
export const createLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings);
