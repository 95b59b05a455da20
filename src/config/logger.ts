/**
 * Logger configuration
 * Pino-based structured logging
 *
 * Console:
 * - LOG_PRETTY=true: coloured single-line format (local runs)
 * - otherwise: one JSON object per line on stderr
 *
 * File (optional, when LOG_DIR is set):
 * - LOG_DIR/YYYY-MM-DD/review-harvester.log
 * - daily rotation, 30 days retained
 *
 * stdout is left to the CLI for progress output, so every log line goes to stderr.
 */

import pino from "pino";
import { createStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getDateStringWithDash, getTimestampWithTimezone } from "@/utils/timestamp";

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test" ? "silent" : NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const SERVICE_NAME = "review-harvester";

const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

/**
 * Daily rotating file stream: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(logDir: string, prefix: string) {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      fs.mkdirSync(path.join(logDir, dateDir), { recursive: true });
      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: logDir,
      maxFiles: 30,
      maxSize: "100M",
    },
  );
}

/**
 * Threshold derived from LOG_LEVEL for the console hook
 */
function consoleThreshold(): number {
  switch (LOG_LEVEL) {
    case "trace":
      return LOG_LEVELS.TRACE;
    case "debug":
      return LOG_LEVELS.DEBUG;
    case "info":
      return LOG_LEVELS.INFO;
    case "warn":
      return LOG_LEVELS.WARN;
    case "error":
      return LOG_LEVELS.ERROR;
    case "fatal":
      return LOG_LEVELS.FATAL;
    default:
      return Number.POSITIVE_INFINITY;
  }
}

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

const EXCLUDED_FIELDS = ["level", "time", "service", "env", "pid", "hostname", "msg"];

/**
 * Coloured console formatter
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR ? "\x1b[31m" : level >= LOG_LEVELS.WARN ? "\x1b[33m" : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";

  process.stderr.write(`[${time}] ${levelColor}${levelText}\x1b[0m \x1b[36m${msg}\x1b[0m\n`);

  for (const field of Object.keys(logObj)) {
    if (EXCLUDED_FIELDS.includes(field)) continue;
    const value = logObj[field];
    const rendered =
      typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
    process.stderr.write(`  ${field}: ${rendered}\n`);
  }
};

/**
 * JSON console formatter
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  process.stderr.write(
    `${JSON.stringify({ time: getTimestampWithTimezone(), service: SERVICE_NAME, ...logObj, level })}\n`,
  );
};

/**
 * Mirrors every log call to the console; the pino destination itself only
 * feeds the optional file stream.
 */
function createConsoleHook(formatter: ConsoleFormatter): pino.LoggerOptions["hooks"] {
  const threshold = consoleThreshold();
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      if (level < threshold) return;

      // pino call forms: logger.info(msg) | logger.info(obj, msg)
      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};
      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") logObj.msg = second;
      }

      // child bindings (component, asin, ...) are not part of inputArgs
      const bindings = this.bindings();
      formatter({ ...bindings, ...logObj }, level);
    },
  };
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: SERVICE_NAME,
    env: NODE_ENV,
  },
  hooks: createConsoleHook(LOG_PRETTY ? formatConsolePretty : formatConsoleJson),
};

const streams: pino.StreamEntry[] = LOG_DIR
  ? [{ level: "debug", stream: createRotatingStream(LOG_DIR, SERVICE_NAME) }]
  : [];

export const logger: pino.Logger = pino(baseConfig, pino.multistream(streams));

export type Logger = pino.Logger;
