import chalk from "chalk";

export const RULE = "=".repeat(48);

const LEVELS = {
  info: { label: "[INFO]", color: chalk.green },
  warn: { label: "[WARN]", color: chalk.yellow },
  error: { label: "[ERROR]", color: chalk.red },
} as const;

type Level = keyof typeof LEVELS;

function log(level: Level, message: string): void {
  const { label, color } = LEVELS[level];
  console.log(`${color(label)} ${message}`);
}

export function logInfo(message: string): void {
  log("info", message);
}

export function logWarn(message: string): void {
  log("warn", message);
}

export function logError(message: string): void {
  log("error", message);
}

/** Print an error line and terminate with exit status 1. */
export function errorOut(message: string): never {
  logError(message);
  process.exit(1);
}

export function printBanner(title: string): void {
  console.log(title);
  console.log(RULE);
}
