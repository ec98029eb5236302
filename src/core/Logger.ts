import { promises as fs } from "fs";
import path from "path";

export type LogLevel = "info" | "warn" | "error";

const levelPrefixes: Record<LogLevel, string> = {
  info: "[INFO]",
  warn: "[WARN]",
  error: "[ERROR]",
};

const LOG_FILE_NAME = "app.log";

export interface LoggerOptions {
  /** Keeps info lines out of the console; they still reach the log file. */
  quiet?: boolean;
}

export class Logger {
  private readonly baseDir: string;
  private readonly quiet: boolean;

  constructor(baseDir: string, options: LoggerOptions = {}) {
    this.baseDir = baseDir;
    this.quiet = options.quiet ?? false;
  }

  get filePath(): string {
    return path.join(this.baseDir, LOG_FILE_NAME);
  }

  async info(message: string): Promise<void> {
    await this.write("info", message);
  }

  async warn(message: string): Promise<void> {
    await this.write("warn", message);
  }

  async error(message: string): Promise<void> {
    await this.write("error", message);
  }

  async write(level: LogLevel, message: string): Promise<void> {
    const timestamp = new Date().toISOString();
    const line = `${timestamp} ${levelPrefixes[level]} ${message}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else if (!this.quiet) {
      console.log(line);
    }
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.appendFile(this.filePath, `${line}\n`, "utf-8");
  }
}
