// upload-reformer/src/utils/logger.ts
import winston from "winston";

const isTest = process.env.NODE_ENV === "test";

// Custom Log Format
const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, stack }) => {
    return stack
      ? `${timestamp} ${level}: ${message}\nStack: ${stack}`
      : `${timestamp} ${level}: ${message}`;
  })
);

const transports: winston.transport[] = [new winston.transports.Console()];
if (!isTest) {
  transports.push(
    new winston.transports.File({ filename: "logs/proxy.log", level: "info" }),
    new winston.transports.File({ filename: "logs/error.log", level: "error" })
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: logFormat,
  silent: isTest,
  transports,
});
