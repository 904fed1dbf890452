/** Split an input line on runs of whitespace. A blank line has no tokens. */
export function tokenize(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}
