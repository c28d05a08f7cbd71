import chalk from "chalk";
import { LogLevel, loadConfig } from "../configs/environment";

type Level = Exclude<LogLevel, "silent">;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_LABEL: Record<Level, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.green("INFO"),
  warn: chalk.yellow("WARN"),
  error: chalk.red("ERROR"),
};

const formatMeta = (meta: unknown): string => {
  if (meta instanceof Error) {
    return meta.stack || `${meta.name}: ${meta.message}`;
  }
  if (typeof meta === "string") {
    return meta;
  }
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
};

const write = (level: Level, message: string, meta: unknown[]) => {
  const threshold = LEVEL_WEIGHT[loadConfig().logging.level];
  if (LEVEL_WEIGHT[level] < threshold) return;

  const line = [
    chalk.gray("[") + chalk.gray(new Date().toISOString()) + chalk.gray("]"),
    LEVEL_LABEL[level],
    message,
    ...meta.map(formatMeta),
  ].join(" ");

  if (level === "error" || level === "warn") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
};

export const logger = {
  debug: (message: string, ...meta: unknown[]) => write("debug", message, meta),
  info: (message: string, ...meta: unknown[]) => write("info", message, meta),
  warn: (message: string, ...meta: unknown[]) => write("warn", message, meta),
  error: (message: string, ...meta: unknown[]) => write("error", message, meta),
};
