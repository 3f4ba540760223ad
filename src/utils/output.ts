import { colorize, type TerminalColor } from "./colors.js";

export function formatAlertMessage(
  label: string,
  color: TerminalColor,
  message: string,
): string {
  const prefix = colorize(`${label}:`, color);
  return `${prefix} ${message}`;
}

export function formatErrorMessage(message: string): string {
  return formatAlertMessage("Error", "red", message);
}

export function formatWarningMessage(message: string): string {
  return formatAlertMessage("Warning", "yellow", message);
}
