import { Command } from "commander";

import {
  type FeatureProbe,
  getDefaultFeatureProbe,
} from "../probe/feature-probe.js";
import {
  renderReportJson,
  renderReportTranscript,
} from "../render/transcripts/report.js";
import { type Alert, writeCommandOutput } from "./output.js";

export interface ReportCommandOptions {
  json?: boolean;
  probe?: FeatureProbe;
}

export interface ReportCommandResult {
  body: string;
  raw: boolean;
  alerts: Alert[];
}

export function runReportCommand(
  options: ReportCommandOptions = {},
): ReportCommandResult {
  const probe = options.probe ?? getDefaultFeatureProbe();
  const snapshot = probe.snapshot();

  const alerts: Alert[] = [];
  const searchPath = probe.searchPath();
  if (searchPath === undefined || searchPath.trim().length === 0) {
    alerts.push({
      severity: "warn",
      message:
        "PATH is not set; executables were looked up in the current directory.",
    });
  }

  if (options.json) {
    return { body: renderReportJson(snapshot), raw: true, alerts };
  }
  return { body: renderReportTranscript(snapshot), raw: false, alerts };
}

export function createReportCommand(): Command {
  return new Command("report")
    .description("Report every detected host feature")
    .option("--json", "Print the report as JSON")
    .allowExcessArguments(false)
    .action((options: { json?: boolean }) => {
      writeCommandOutput(runReportCommand({ json: options.json }));
    });
}
