import {
  isExecutablePresent,
  type FeatureSnapshot,
} from "../../probe/feature-probe.js";
import { describeOs } from "../../probe/os.js";
import {
  formatOptionalValue,
  formatProbeStatus,
  toProbeStatus,
} from "../utils/status.js";
import { renderTable } from "../utils/table.js";
import { renderTranscript } from "../utils/transcript.js";

interface ReportRow {
  feature: string;
  present: boolean;
  detail: string | undefined;
}

export function buildReportRows(snapshot: FeatureSnapshot): ReportRow[] {
  return [
    { feature: "hard links", present: snapshot.hardLink, detail: undefined },
    { feature: "symbolic links", present: snapshot.symLink, detail: undefined },
    { feature: "POSIX user ids", present: snapshot.userId, detail: undefined },
    {
      feature: "convert",
      present: isExecutablePresent(snapshot.imageConvert),
      detail: snapshot.imageConvert,
    },
    {
      feature: "identify",
      present: isExecutablePresent(snapshot.imageIdentify),
      detail: snapshot.imageIdentify,
    },
  ];
}

export function renderReportTranscript(snapshot: FeatureSnapshot): string {
  const table = renderTable<ReportRow>({
    columns: [
      { header: "FEATURE", accessor: (row) => row.feature },
      {
        header: "STATUS",
        accessor: (row) => formatProbeStatus(toProbeStatus(row.present)),
      },
      { header: "DETAIL", accessor: (row) => formatOptionalValue(row.detail) },
    ],
    rows: buildReportRows(snapshot),
  });

  return renderTranscript({
    metadata: [{ label: "OS", value: describeOs(snapshot.os) }],
    sections: [table],
  });
}

export function renderReportJson(snapshot: FeatureSnapshot): string {
  return JSON.stringify(
    {
      os: snapshot.os,
      hardLink: snapshot.hardLink,
      symLink: snapshot.symLink,
      userId: snapshot.userId,
      imageConvert: snapshot.imageConvert ?? null,
      imageIdentify: snapshot.imageIdentify ?? null,
    },
    null,
    2,
  );
}
