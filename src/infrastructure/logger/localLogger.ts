import { promises as fs } from "node:fs";
import path from "node:path";
import type { LoggerPort } from "../../interfaces/ports";

type LogLevel = "info" | "warn" | "error";

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  runId: string;
  message: string;
  pid: number;
};

/** One JSON line per entry in `<baseDir>/<runId>.log`, optionally mirrored to the console. */
export class LocalLogger implements LoggerPort {
  constructor(
    private readonly baseDir: string,
    private readonly mirrorToConsole = true
  ) {}

  async info(runId: string, message: string) {
    await this.append(runId, "info", message);
  }

  async warn(runId: string, message: string) {
    await this.append(runId, "warn", message);
  }

  async error(runId: string, message: string) {
    await this.append(runId, "error", message);
  }

  private async append(runId: string, level: LogLevel, message: string) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId,
      message,
      pid: process.pid
    };

    if (this.mirrorToConsole) {
      const line = `[${entry.timestamp}] ${level.toUpperCase()} ${runId}: ${message}`;
      if (level === "error") {
        console.error(line);
      } else if (level === "warn") {
        console.warn(line);
      } else {
        console.log(line);
      }
    }

    const filePath = path.join(this.baseDir, `${runId}.log`);
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.appendFile(filePath, `${JSON.stringify(entry)}\n`);
    } catch (error) {
      console.error("Logger write failed", error);
    }
  }
}
