import { logger } from "./logger";
import chalk from "chalk";
import { v4 as uuidv4 } from "uuid";

export type LogStatus =
  | "received"
  | "processing"
  | "skipped"
  | "completed"
  | "forwarded"
  | "failed"
  | "warning";

export interface LogEventCurriedProps {
  status: LogStatus;
  message: string;
  error?: string; // optional error detail (message or stack)
}

export type LogEventFn = (props: LogEventCurriedProps) => void;

export interface RequestLogger {
  requestId: string;
  logEvent: LogEventFn;
}

function colorize(status: LogStatus, message: string): string {
  switch (status) {
    case "received":
      return chalk.yellow.bold(message);
    case "processing":
    case "forwarded":
      return chalk.blue.bold(message);
    case "completed":
      return chalk.green.bold(message);
    case "skipped":
      return chalk.gray.bold(message);
    default:
      return chalk.red.bold(message);
  }
}

/**
 * Creates a logger bound to a single upload request. Every event is tagged
 * with the request id and the uploaded file name so interleaved requests can
 * be told apart in the shared log.
 */
export function createRequestLogger({
  filename,
  requestId = uuidv4(),
}: {
  filename: string;
  requestId?: string;
}): RequestLogger {
  const logEvent: LogEventFn = ({ status, message, error }) => {
    const line = `📜 ${colorize(status, message)} | RequestID: ${chalk.magenta(
      requestId
    )} | File: ${chalk.cyan(filename)} | Status: ${chalk.white.bold(status)}`;

    if (status === "failed") {
      logger.error(line, error ? { error } : undefined);
    } else if (status === "warning") {
      logger.warn(line, error ? { error } : undefined);
    } else {
      logger.info(line);
    }
  };

  return { requestId, logEvent };
}
