import fs from "node:fs";
import chalk from "chalk";

export type LogLevel = "INFO" | "WARNING" | "ERROR";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Flush and close the log file, if any */
  close(): Promise<void>;
}

type LoggerOptions = {
  quiet?: boolean;
  logFile?: string;
  /** Clock override, used by tests */
  now?: () => Date;
};

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** `2024-05-01 13:45:10,123` */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

export function formatLine(date: Date, level: LogLevel, message: string): string {
  return `${formatTimestamp(date)} - ${level} - ${message}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const quiet = Boolean(options.quiet);
  const now = options.now ?? (() => new Date());
  const logFile = options.logFile;
  const file = logFile ? fs.createWriteStream(logFile, { flags: "a", encoding: "utf8" }) : null;
  let fileFailed = false;

  // An unwritable log file turns file logging off; console output carries on
  file?.on("error", (err) => {
    if (fileFailed) return;
    fileFailed = true;
    // eslint-disable-next-line no-console
    console.warn(chalk.yellow(`Cannot write log file ${logFile}: ${err.message}`));
  });

  const emit = (level: LogLevel, message: string) => {
    const line = formatLine(now(), level, message);
    if (file && !fileFailed) {
      file.write(line + "\n");
    }
    if (level === "ERROR") {
      // eslint-disable-next-line no-console
      console.error(chalk.red(line));
    } else if (level === "WARNING") {
      // eslint-disable-next-line no-console
      console.warn(chalk.yellow(line));
    } else if (!quiet) {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  };

  return {
    info: (message) => emit("INFO", message),
    warn: (message) => emit("WARNING", message),
    error: (message) => emit("ERROR", message),
    close: () =>
      new Promise<void>((resolve) => {
        if (!file || file.destroyed) {
          resolve();
          return;
        }
        file.once("close", () => resolve());
        file.end();
      })
  };
}
