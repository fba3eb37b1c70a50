require("dotenv").config();

import winston, { format } from "winston";
import Transport from "winston-transport";
import path from "path";

const { combine, timestamp, colorize, printf } = winston.format;

const DEFAULT_LOGGER_ID = "matrix-ops";

// src/ when run from sources, dist/ once built
const SOURCE_ROOT = path.resolve(__dirname, "..");

const enumerateErrorFormat = winston.format((info) => {
  if (info instanceof Error) {
    const output = Object.assign(
      {
        message: info.message,
        stack: info.stack,
      },
      info
    );

    return output;
  }

  return info;
});

const file = (thisModule?: NodeJS.Module) =>
  format((info) => {
    if (!thisModule) {
      return info;
    }
    return { ...info, moduleName: relativeModuleName(thisModule.filename) };
  });

/**
 * Module path as shown in log lines, e.g. "engine/DiagonalSums.ts"
 */
export function relativeModuleName(fileName: string): string {
  return path.relative(SOURCE_ROOT, fileName).split(path.sep).join("/");
}

export function getLogger(thisModule?: NodeJS.Module): winston.Logger {
  const loggerId = thisModule?.filename ?? DEFAULT_LOGGER_ID;
  if (!winston.loggers.has(loggerId)) {
    createLogger(loggerId, thisModule);
  }

  return winston.loggers.get(loggerId);
}

function createLogger(loggerId: string, thisModule?: NodeJS.Module) {
  winston.loggers.add(loggerId, {
    level: process.env.LOG_LEVEL || "info",
    silent: process.env.NODE_ENV === "test",
    format: winston.format.combine(timestamp(), enumerateErrorFormat()),
    transports: _createConsoleTransport(thisModule),
  });
}

function _createConsoleTransport(thisModule?: NodeJS.Module): Transport {
  return new winston.transports.Console({
    format: combine(
      colorize(),
      file(thisModule)(),
      printf(
        (info) =>
          `[${info.timestamp}] ${info.level}  [${info.moduleName ?? DEFAULT_LOGGER_ID}]: ${
            info.message
          } ${info.stack ? `\n${info.stack}` : ""}`
      )
    ),
    stderrLevels: ["error"],
  });
}
