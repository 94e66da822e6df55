import { createLogger, format, transports } from "winston";
import path from "path";
import { AsyncLocalStorage } from "async_hooks";

const logDir = path.resolve(process.cwd(), "logs");
const isTest = process.env.NODE_ENV === "test";

const asyncLocalStorage = new AsyncLocalStorage<Map<string, string>>();

function safeStringify(obj: unknown): string {
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return "[unserializable]";
  }
}

export function currentRequestId(): string | undefined {
  return asyncLocalStorage.getStore()?.get("requestId");
}

const logger = createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    // Capture arbitrary metadata passed as the 2nd arg: logger.info(msg, meta)
    format.errors({ stack: true }),
    format.metadata({ fillExcept: ["message", "level", "timestamp", "label"] }),
    format.printf(({ timestamp, level, message, metadata }) => {
      const requestId = currentRequestId();
      const requestIdStr = requestId ? `[RequestId: ${requestId}] ` : "";
      const metaStr =
        metadata && typeof metadata === "object" && Object.keys(metadata).length
          ? ` ${safeStringify(metadata)}`
          : "";
      return `${timestamp} [${level.toUpperCase()}]: ${requestIdStr}${message}${metaStr}`;
    })
  ),
  transports: [
    // No log files from test runs.
    ...(isTest ? [] : [new transports.File({ filename: path.join(logDir, "app.log"), level: "info" })]),
    new transports.Console({ level: "debug" }),
  ],
  exitOnError: false,
});

export { asyncLocalStorage };
export default logger;
