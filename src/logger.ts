import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type LoggerOptions = {
  level?: LogLevel;
  scope?: string;
  out?: (line: string) => void;
  err?: (line: string) => void;
};

const rank: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export function createLogger({
  level = "info",
  scope = "web-research",
  out = (line) => console.log(line),
  err = (line) => console.error(line),
}: LoggerOptions = {}): Logger {
  const enabled = (l: LogLevel) => rank[l] >= rank[level];
  const tag = chalk.gray(`[${scope}]`);

  return {
    debug: (m) => enabled("debug") && out(`${tag} ${chalk.gray(m)}`),
    info: (m) => enabled("info") && out(`${tag} ${chalk.blue(m)}`),
    success: (m) => enabled("info") && out(`${tag} ${chalk.green(m)}`),
    warn: (m) => enabled("warn") && out(`${tag} ${chalk.yellow(m)}`),
    error: (m) => enabled("error") && err(`${tag} ${chalk.red(m)}`),
  };
}
