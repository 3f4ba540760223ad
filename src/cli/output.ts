import { formatWarningMessage } from "../utils/output.js";

export type AlertSeverity = "warn";

export interface Alert {
  readonly severity: AlertSeverity;
  readonly message: string;
}

export interface CommandOutputPayload {
  readonly alerts?: readonly Alert[];
  readonly stderr?: string | readonly string[];
  readonly exitCode?: number;
}

export function writeCommandOutput(payload: CommandOutputPayload): void {
  for (const alert of payload.alerts ?? []) {
    process.stderr.write(`${formatWarningMessage(alert.message)}\n`);
  }

  for (const entry of normalizeToArray(payload.stderr)) {
    process.stderr.write(entry);
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}

function normalizeToArray(
  value: string | readonly string[] | undefined,
): readonly string[] {
  if (value === undefined) {
    return [];
  }
  if (typeof value === "string") {
    return [value];
  }
  return value;
}
