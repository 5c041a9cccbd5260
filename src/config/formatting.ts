export function joinLines(lines: readonly string[]): string {
  return lines.join('\n');
}

export function pluralize(count: number, singular: string, plural?: string): string {
  const word = count === 1 ? singular : (plural ?? `${singular}s`);
  return `${count} ${word}`;
}

export function formatOperationSummary(summary: {
  truncated?: boolean;
  truncatedReason?: string;
  tip?: string;
  failed?: number;
}): string {
  const lines: string[] = [];
  if (summary.truncated) {
    lines.push(
      `!! PARTIAL RESULTS: ${summary.truncatedReason ?? 'results truncated'}`
    );
    if (summary.tip) lines.push(`Tip: ${summary.tip}`);
  }
  if (summary.failed && summary.failed > 0) {
    lines.push(`Note: ${pluralize(summary.failed, 'file')} could not be updated.`);
  }
  return joinLines(lines);
}
