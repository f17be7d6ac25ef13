import chalk from "chalk";
import { loadConfig } from "../configs/environment";

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.green("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR"),
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_WEIGHT;

const formatMeta = (meta: unknown): string => {
  if (meta instanceof Error) {
    return meta.stack || `${meta.name}: ${meta.message}`;
  }
  if (typeof meta === "string") return meta;
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
};

class Logger {
  private threshold: number;

  constructor(level: string) {
    this.threshold = LEVEL_WEIGHT[isLogLevel(level) ? level : "info"];
  }

  debug(message: string, ...meta: unknown[]) {
    this.write("debug", message, meta);
  }

  info(message: string, ...meta: unknown[]) {
    this.write("info", message, meta);
  }

  warn(message: string, ...meta: unknown[]) {
    this.write("warn", message, meta);
  }

  error(message: string, ...meta: unknown[]) {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]) {
    if (LEVEL_WEIGHT[level] < this.threshold) return;

    const line = [
      chalk.gray(`[${new Date().toISOString()}]`),
      LEVEL_LABEL[level],
      message,
      ...meta.map(formatMeta),
    ].join(" ");

    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger(loadConfig().logging.level);
