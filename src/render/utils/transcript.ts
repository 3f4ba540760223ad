export interface TranscriptOptions {
  sections?: string[][];
}

export function renderTranscript({ sections = [] }: TranscriptOptions): string {
  const lines: string[] = [];

  sections.forEach((block, index) => {
    if (block.length === 0) {
      return;
    }

    lines.push(...block);

    if (index < sections.length - 1) {
      lines.push("");
    }
  });

  return trimTrailingBlankLines(lines).join("\n");
}

function trimTrailingBlankLines(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1]?.trim() === "") {
    end -= 1;
  }

  return lines.slice(0, end);
}
