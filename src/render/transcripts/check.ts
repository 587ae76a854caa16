import type {
  RequirementResult,
  RequirementsEvaluation,
} from "../../requirements/evaluate.js";
import {
  formatOptionalValue,
  formatProbeStatus,
  toProbeStatus,
} from "../utils/status.js";
import { renderTable } from "../utils/table.js";
import { renderTranscript } from "../utils/transcript.js";

export function renderCheckTranscript(
  evaluation: RequirementsEvaluation,
  configPath: string,
): string {
  if (evaluation.results.length === 0) {
    return `No requirements declared in ${configPath}.`;
  }

  const table = renderTable<RequirementResult>({
    columns: [
      { header: "KIND", accessor: (row) => row.kind },
      { header: "REQUIREMENT", accessor: (row) => row.label },
      {
        header: "STATUS",
        accessor: (row) => formatProbeStatus(toProbeStatus(row.satisfied)),
      },
      { header: "DETAIL", accessor: (row) => formatOptionalValue(row.detail) },
    ],
    rows: evaluation.results,
  });

  const unmet = evaluation.results.filter((result) => !result.satisfied);
  const total = evaluation.results.length;
  const summary =
    unmet.length === 0
      ? `All ${total} requirements met.`
      : `${unmet.length} of ${total} requirements unmet.`;

  return renderTranscript({
    metadata: [{ label: "Config", value: configPath }],
    sections: [table],
    hint: summary,
  });
}
