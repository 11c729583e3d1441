import chalk from "chalk";

export const theme = {
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  muted: chalk.gray,
  emphasis: chalk.bold,
} as const;

export const RULE = "-".repeat(59);

export function formatSectionHeader(text: string): string {
  return theme.info(`\n${text}:`);
}

export function formatWarning(text: string): string {
  return theme.warning(`Warning: ${text}`);
}
