import { randomUUID } from "crypto";
import dbg from "debug";
import winston, { LogEntry } from "winston";
import { disableFileLog } from "./config";
import { getInstallerPath } from "./getInstallerPath";

type LogLevel = "error" | "warn" | "info" | "debug";
type Tags = Record<string, unknown>;

const localDebugger = dbg("bugster-installer");
const runId = randomUUID();

let fileLogger: winston.Logger | null = null;
let fileLoggerFailed = false;

function getFileLogger() {
  if (disableFileLog || fileLoggerFailed) {
    return null;
  }

  if (fileLogger == null) {
    try {
      fileLogger = winston.createLogger({
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        // Everything down to "debug" ends up in the file; the console is handled separately
        level: "debug",
        transports: [
          new winston.transports.File({
            filename: getInstallerPath("logs", "installer.log"),
            maxFiles: 3,
            maxsize: 1024 * 1024,
          }),
        ],
      });
    } catch (error) {
      fileLoggerFailed = true;
      localDebugger("Failed to create log file %o", error);
    }
  }

  return fileLogger;
}

export async function flushLog() {
  const logger = fileLogger;
  if (logger == null) {
    return;
  }

  fileLogger = null;

  await new Promise<void>(resolve => {
    logger.on("finish", () => resolve());
    logger.end();
  });
}

export function logDebug(message: string, tags?: Tags) {
  log(message, "debug", tags);
}

export function logError(message: string, tags?: Tags) {
  log(message, "error", tags);
}

export function logInfo(message: string, tags?: Tags) {
  log(message, "info", tags);
}

export function logWarning(message: string, tags?: Tags) {
  log(message, "warn", tags);
}

function log(message: string, level: LogLevel, tags?: Tags) {
  const formattedTags = formatTags(tags);

  localDebugger(message, formattedTags ?? "");

  const logger = getFileLogger();
  if (logger) {
    const entry: LogEntry = {
      level,
      message,
      ...formattedTags,
      runId,
    };

    logger.log(entry);
  }
}

export function formatTags(tags?: Tags) {
  if (!tags) {
    return;
  }

  return Object.entries(tags).reduce<Tags>((result, [key, value]) => {
    if (value instanceof Error) {
      result[key] = {
        // Keeps extra properties such as ProcessError#stderr
        ...value,
        errorName: value.name,
        errorMessage: value.message,
        errorStack: value.stack ?? "",
      };
    } else {
      result[key] = value;
    }
    return result;
  }, {});
}
