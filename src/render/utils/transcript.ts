export interface TranscriptMetadataEntry {
  label: string;
  value?: string | null;
}

export interface TranscriptOptions {
  metadata?: TranscriptMetadataEntry[];
  sections?: string[][];
  hint?: string;
}

export function renderTranscript({
  metadata = [],
  sections = [],
  hint,
}: TranscriptOptions): string {
  const lines: string[] = [];

  const metadataLines = metadata
    .filter((entry): entry is TranscriptMetadataEntry & { value: string } => {
      return typeof entry.value === "string" && entry.value.length > 0;
    })
    .map((entry) => `${entry.label}: ${entry.value}`);

  if (metadataLines.length > 0) {
    lines.push(...metadataLines, "");
  }

  const nonEmptySections = sections.filter((block) => block.length > 0);
  nonEmptySections.forEach((block, index) => {
    lines.push(...block);
    if (index < nonEmptySections.length - 1) {
      lines.push("");
    }
  });

  if (hint) {
    if (nonEmptySections.length > 0 || metadataLines.length > 0) {
      lines.push("");
    }
    lines.push(hint);
  }

  return trimTrailingBlankLines(lines).join("\n");
}

function trimTrailingBlankLines(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1]?.trim() === "") {
    end -= 1;
  }

  return lines.slice(0, end);
}
