export const DIVIDER = "-".repeat(60);

export const UNAVAILABLE_NOTICE = "(Results unavailable)";

export function placeholderBlock(headerText: string): string {
  return [headerText, UNAVAILABLE_NOTICE].join("\n");
}

export function assembleReport(blocks: string[]): string {
  const lines: string[] = [];
  for (const block of blocks) {
    lines.push(block, DIVIDER);
  }
  return lines.join("\n").trim();
}
