import chalk from "chalk";

export type TerminalColor = "red" | "yellow";

export function colorize(text: string, color: TerminalColor): string {
  if (!text) {
    return text;
  }

  return color === "red" ? chalk.red(text) : chalk.yellow(text);
}
