import winston from "winston";
import path from "path";

const { combine, timestamp, errors, printf } = winston.format;

const fileFormat = combine(
  errors({ stack: true }),
  timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  printf(({ timestamp, level, message, stack }) => {
    const trace = typeof stack === "string" ? `\n${stack}` : "";
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${trace}`;
  }),
);

// info lines stay bare so command output reads like a report
const consoleFormat = combine(
  timestamp({ format: "HH:mm:ss" }),
  printf(({ timestamp, level, message }) => {
    return level === "info" ? `[${timestamp}] ${message}` : `[${timestamp}] ${level.toUpperCase()}: ${message}`;
  }),
);

export interface LoggerOptions {
  level: string;
  /** null disables the file transports */
  logDir: string | null;
  silent?: boolean;
}

export function createLogger(opts: LoggerOptions): winston.Logger {
  const files = opts.logDir
    ? [
        // failed steps, API errors
        new winston.transports.File({
          filename: path.join(opts.logDir, "rs-momentum-error.log"),
          level: "error",
          format: fileFormat,
        }),
        new winston.transports.File({
          filename: path.join(opts.logDir, "rs-momentum.log"),
          format: fileFormat,
          maxsize: 5 * 1024 * 1024,
          maxFiles: 5,
        }),
      ]
    : [];

  return winston.createLogger({
    level: opts.level,
    silent: opts.silent ?? false,
    transports: [new winston.transports.Console({ format: consoleFormat, stderrLevels: ["error", "warn"] }), ...files],
  });
}

const underTest = process.env.VITEST !== undefined;

const logger = createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  logDir: underTest ? null : path.resolve(process.cwd(), process.env.LOG_DIR ?? "logs"),
  silent: underTest,
});

export default logger;
