import {
  formatCliOutput,
  formatErrorMessage,
  formatWarningMessage,
} from "../utils/output.js";

export type AlertSeverity = "info" | "warn" | "error";

export interface Alert {
  readonly severity: AlertSeverity;
  readonly message: string;
}

export interface CommandOutputPayload {
  readonly body?: string | readonly string[];
  readonly alerts?: readonly Alert[];
  readonly exitCode?: number;
  /** Writes the body verbatim, without the blank-line framing. */
  readonly raw?: boolean;
}

export function writeCommandOutput(payload: CommandOutputPayload): void {
  for (const alert of payload.alerts ?? []) {
    const formattedAlert = `${formatAlert(alert)}\n`;
    if (alert.severity === "info") {
      process.stdout.write(formattedAlert);
    } else {
      process.stderr.write(formattedAlert);
    }
  }

  const body = payload.body;
  if (body !== undefined) {
    const normalizedBody = typeof body === "string" ? body : body.join("\n");
    if (normalizedBody.trim().length > 0) {
      process.stdout.write(
        payload.raw === true
          ? `${normalizedBody.trimEnd()}\n`
          : formatCliOutput(normalizedBody),
      );
    }
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}

function formatAlert(alert: Alert): string {
  switch (alert.severity) {
    case "error":
      return formatErrorMessage(alert.message);
    case "warn":
      return formatWarningMessage(alert.message);
    case "info":
      return alert.message;
  }
}
