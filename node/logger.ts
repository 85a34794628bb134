import { resolve } from "node:path";
import winston from "winston";

export type Logger = winston.Logger;

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: ReadonlyArray<LogLevel> = [
  "error",
  "warn",
  "info",
  "debug",
];

export function createLogger({
  level,
  file,
}: {
  level: LogLevel;
  file?: string | undefined;
}): Logger {
  const transport = file
    ? new winston.transports.File({
        filename: resolve(file),
        options: { flags: "w" }, // 'w' flag truncates the file if it exists
      })
    : new winston.transports.Console({
        // keep stdout free for the host
        stderrLevels: [...LOG_LEVELS],
      });

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json(),
    ),
    transports: [transport],
  });
}
