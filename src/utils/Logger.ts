import path from "path";
import winston, { format } from "winston";
import Transport from "winston-transport";

const { combine, timestamp, colorize, printf } = winston.format;

const DEFAULT_LOGGER_KEY = "clmm";

/**
 * Logging capability handed to each component at construction.
 * A winston logger satisfies it; tests pass jest mocks.
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const enumerateErrorFormat = winston.format((info) => {
  if (info instanceof Error) {
    return Object.assign({ message: info.message, stack: info.stack }, info);
  }
  return info;
});

const file = (thisModule?: NodeJS.Module) =>
  format((info) => {
    if (!thisModule) {
      return info;
    }
    const basePath = path.resolve(".");
    const moduleName = path.relative(basePath, thisModule.filename);
    return { ...info, moduleName };
  });

function loggerKey(thisModule?: NodeJS.Module): string {
  return thisModule?.filename ?? DEFAULT_LOGGER_KEY;
}

export function getLogger(thisModule?: NodeJS.Module): winston.Logger {
  const key = loggerKey(thisModule);
  if (!winston.loggers.has(key)) {
    createLogger(key, thisModule);
  }

  return winston.loggers.get(key);
}

function createLogger(key: string, thisModule?: NodeJS.Module) {
  winston.loggers.add(key, {
    level: process.env.LOG_LEVEL || "info",
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
          `[${String(info.timestamp)}] ${info.level}  [${String(
            info.moduleName ?? DEFAULT_LOGGER_KEY
          )}]: ${String(info.message)} ${info.stack ? `\n${String(info.stack)}` : ""}`
      )
    ),
    stderrLevels: ["error"],
  });
}
