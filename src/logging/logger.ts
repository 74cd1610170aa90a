import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";

type LogLevel = "info" | "warn" | "error";

let verboseEnabled = false;
let loadingFrame = 0;
let loadingIntervalId: NodeJS.Timeout | null = null;
let logFile: WriteStream | null = null;

const levelPrefix: Record<LogLevel, string> = {
  info: "INFO",
  warn: "WARN",
  error: "ERROR"
};

const ansi = {
  reset: "\u001b[0m",
  cyan: "\u001b[36m",
  yellow: "\u001b[33m",
  red: "\u001b[31m"
} as const;

function isColorEnabled(output: NodeJS.WriteStream): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  const forceColor = process.env.FORCE_COLOR;
  if (forceColor !== undefined && forceColor !== "0") {
    return true;
  }

  return output.isTTY === true;
}

function formatPrefix(level: LogLevel, output: NodeJS.WriteStream): string {
  const prefix = `[${levelPrefix[level]}]`;
  if (!isColorEnabled(output)) {
    return prefix;
  }

  const color =
    level === "info" ? ansi.cyan : level === "warn" ? ansi.yellow : ansi.red;
  return `${color}${prefix}${ansi.reset}`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatLogTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatLogFileLine(level: LogLevel, message: string, date: Date): string {
  return `${formatLogTimestamp(date)} - ${levelPrefix[level]} - ${message}\n`;
}

export function buildLogFilePath(directory: string, date: Date): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return join(directory, `repo-mirror_${stamp}.log`);
}

function write(level: LogLevel, message: string): void {
  logFile?.write(formatLogFileLine(level, message, new Date()));

  const output = level === "error" ? process.stderr : process.stdout;
  const line = `${formatPrefix(level, output)} ${message}`;
  if (level === "error") {
    console.error(line);
    return;
  }

  console.log(line);
}

export function setVerboseLoggingEnabled(enabled: boolean): void {
  verboseEnabled = enabled;
}

/**
 * Mirrors every subsequent log line (verbose ones included) into a timestamped file under `directory`.
 */
export async function openLogFile(directory: string, now: Date = new Date()): Promise<string> {
  await closeLogFile();
  await mkdir(directory, { recursive: true });

  const path = buildLogFilePath(directory, now);
  const stream = createWriteStream(path, { flags: "a", encoding: "utf8" });
  await new Promise<void>((resolvePromise, rejectPromise) => {
    stream.once("open", () => resolvePromise());
    stream.once("error", rejectPromise);
  });
  logFile = stream;
  return path;
}

export async function closeLogFile(): Promise<void> {
  const stream = logFile;
  if (!stream) {
    return;
  }

  logFile = null;
  await new Promise<void>((resolvePromise, rejectPromise) => {
    stream.once("error", rejectPromise);
    stream.end(() => resolvePromise());
  });
}

export const logger = {
  info(message: string): void {
    write("info", message);
  },
  verbose(message: string): void {
    if (!verboseEnabled) {
      logFile?.write(formatLogFileLine("info", message, new Date()));
      return;
    }
    write("info", message);
  },
  warn(message: string): void {
    write("warn", message);
  },
  error(message: string): void {
    write("error", message);
  },
  startLoading(message: string): () => void {
    if (verboseEnabled || !process.stdout.isTTY) {
      write("info", message);
      return () => {};
    }

    logFile?.write(formatLogFileLine("info", message, new Date()));
    const frames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

    if (loadingIntervalId) {
      clearInterval(loadingIntervalId);
      loadingIntervalId = null;
      process.stdout.write("\r\u001b[2K");
    }

    loadingFrame = 0;
    const intervalId = setInterval(() => {
      const frame = frames[loadingFrame % frames.length];
      process.stdout.write(`\r${frame} ${message}`);
      loadingFrame++;
    }, 80);
    loadingIntervalId = intervalId;
    let stopped = false;

    return () => {
      if (stopped) {
        return;
      }

      stopped = true;
      clearInterval(intervalId);
      if (loadingIntervalId === intervalId) {
        loadingIntervalId = null;
        process.stdout.write("\r\u001b[2K");
      }
    };
  }
};
