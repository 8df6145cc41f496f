/**
 * Greedy word wrap on spaces. A word longer than `maxLineLength` keeps a line
 * to itself; text without spaces is returned unchanged.
 */
export function wrapText(text: string, maxLineLength: number): string {
  if (maxLineLength <= 0 || text.length <= maxLineLength) {
    return text;
  }

  const lines: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= maxLineLength) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) {
    lines.push(current);
  }

  return lines.join("\n");
}
