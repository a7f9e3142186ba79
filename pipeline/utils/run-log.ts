import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogFn = (message: string) => void;

export interface ScrapeLogger {
  log: LogFn;
  warn: LogFn;
  error: LogFn;
}

export const consoleLogger: ScrapeLogger = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message)
};

interface RunLogOptions {
  logFilePath: string | null;
  now?: () => Date;
}

/**
 * Console logger that also appends every line, timestamped and tagged with
 * its level, to `logFilePath`. A failing log file write is reported once on
 * stderr and the file is not written again for the rest of the run.
 */
export const createRunLog = ({ logFilePath, now = () => new Date() }: RunLogOptions): ScrapeLogger => {
  let fileWritable = logFilePath !== null;

  if (logFilePath) {
    try {
      mkdirSync(dirname(logFilePath), { recursive: true });
    } catch (mkdirError) {
      fileWritable = false;
      console.error(`[run-log] Cannot create log directory for ${logFilePath}: ${String(mkdirError)}`);
    }
  }

  const write = (level: string, message: string, print: LogFn) => {
    const line = `${now().toISOString()} ${level} ${message}`;
    print(line);

    if (!fileWritable || !logFilePath) {
      return;
    }

    try {
      appendFileSync(logFilePath, `${line}\n`, "utf8");
    } catch (appendError) {
      fileWritable = false;
      console.error(`[run-log] Disabled log file ${logFilePath}: ${String(appendError)}`);
    }
  };

  return {
    log: (message) => write("INFO", message, consoleLogger.log),
    warn: (message) => write("WARN", message, consoleLogger.warn),
    error: (message) => write("ERROR", message, consoleLogger.error)
  };
};
