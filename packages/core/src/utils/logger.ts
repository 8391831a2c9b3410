/**
 * Logging Module
 * Provides centralized logging using Winston
 */

import winston from "winston";
import path from "node:path";
import os from "node:os";
import fs from "node:fs";

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = "error",
  WARN = "warn",
  INFO = "info",
  DEBUG = "debug",
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level?: LogLevel;
  logToFile?: boolean;
  logDir?: string;
  logFileName?: string;
  maxFiles?: number;
  maxSize?: number;
  silent?: boolean;
}

/**
 * Default log directory
 */
export const getDefaultLogDir = (): string => {
  return path.join(os.homedir(), ".os-family", "logs");
};

/**
 * Parse a log level name, falling back when it is not one of LogLevel
 */
export const parseLogLevel = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? fallback;
};

const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Create a Winston logger instance
 */
const createLogger = (config: LoggerConfig = {}): winston.Logger => {
  const {
    level = parseLogLevel(process.env.OS_FAMILY_LOG_LEVEL, LogLevel.INFO),
    logToFile = false,
    logDir = getDefaultLogDir(),
    logFileName = "os-family.log",
    maxFiles = 7,
    maxSize = 10 * 1024 * 1024, // 10MB
    silent = false,
  } = config;

  // stdout belongs to query results, so every level goes to stderr
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: Object.values(LogLevel),
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : "";
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (logToFile) {
    ensureLogDir(logDir);

    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, logFileName),
        maxsize: maxSize,
        maxFiles,
        format: winston.format.combine(
          winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
          winston.format.json()
        ),
      })
    );
  }

  return winston.createLogger({
    level,
    silent,
    transports,
  });
};

/**
 * Global logger instance
 */
let loggerInstance: winston.Logger | undefined;

/**
 * Initialize the logger with custom configuration
 */
export const initLogger = (config?: LoggerConfig): winston.Logger => {
  loggerInstance?.close();
  loggerInstance = createLogger(config);
  return loggerInstance;
};

/**
 * Get the logger instance
 */
export const getLogger = (): winston.Logger => {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
};

/**
 * Default logger instance (auto-initialized)
 */
export const logger = {
  error: (message: string, meta?: unknown): void => {
    getLogger().error(message, meta);
  },

  warn: (message: string, meta?: unknown): void => {
    getLogger().warn(message, meta);
  },

  info: (message: string, meta?: unknown): void => {
    getLogger().info(message, meta);
  },

  debug: (message: string, meta?: unknown): void => {
    getLogger().debug(message, meta);
  },
};

export type Logger = typeof logger;
