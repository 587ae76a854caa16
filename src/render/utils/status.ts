import { colorize } from "../../utils/colors.js";

export type ProbeStatus = "ok" | "missing";

export function toProbeStatus(present: boolean): ProbeStatus {
  return present ? "ok" : "missing";
}

export function formatProbeStatus(status: ProbeStatus): string {
  return status === "ok" ? colorize("ok", "green") : colorize("missing", "red");
}

export function formatOptionalValue(value: string | undefined): string {
  return value === undefined || value.length === 0
    ? colorize("-", "gray")
    : value;
}
