import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger.
 * - Local/dev: pretty-printed logs for readability
 * - Lambda/prod: JSON logs
 * - Jest: silent unless LOG_LEVEL is set
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "equity-compare",
    stage: getStage(),
  },
  redact: {
    // Remove sensitive fields from logs
    paths: ["*.password", "*.secret", "*.token", "*.crumb", "*.cookie"],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const prettyTransport: LoggerOptions["transport"] = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    singleLine: false,
    ignore: "pid,hostname",
  },
};

const rootLogger: Logger = pino(
  isLocal() && !isProduction() && !isTest()
    ? { ...baseOptions, transport: prettyTransport }
    : baseOptions
);

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger augmented with AWS Lambda request context fields.
 * Use inside Lambda handlers when `context` is available.
 */
export function withRequestContext(
  moduleName: string | undefined,
  request: {
    awsRequestId?: string;
    functionName?: string;
    functionVersion?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    requestId: request.awsRequestId,
    functionName: request.functionName,
    functionVersion: request.functionVersion,
  });
}

export default rootLogger;
