import winston from "winston";

let logger: winston.Logger | null = null;

export function getLogger(): winston.Logger {
  if (logger) return logger;

  const level = process.env.LOG_LEVEL || "info";
  const isProd = process.env.NODE_ENV === "production";

  const baseFormat = isProd
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(({ level, message, timestamp, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
          return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
        }),
      );

  logger = winston.createLogger({
    level,
    defaultMeta: { service: "task-lineage" },
    // stderr keeps stdout free for CLI output
    transports: [
      new winston.transports.Console({
        format: baseFormat,
        stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
      }),
    ],
  });

  return logger;
}

export function setLogLevel(level: string): void {
  getLogger().level = level;
}
