const FENCE_LANGUAGES = ['json', 'python', 'markdown'];

/**
 * Removes a markdown code fence wrapping the whole string, e.g.
 * "```json\n{...}\n```" becomes "{...}". Text that is not entirely fenced is
 * returned trimmed but otherwise untouched.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```') || !trimmed.endsWith('```') || trimmed.length < 6) {
    return trimmed;
  }
  for (const lang of FENCE_LANGUAGES) {
    const opener = '```' + lang;
    if (trimmed.startsWith(opener)) {
      return trimmed.slice(opener.length, -3).trim();
    }
  }
  return trimmed.slice(3, -3).trim();
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Dedents prompt templates written inside indented code. The deeper indent of
 * the first two lines is taken as the margin; lines indented less than the
 * margin lose all their leading whitespace.
 */
export function cleanIndents(text: string): string {
  const lines = text.split('\n');
  const margin = lines.length > 1
    ? Math.max(indentOf(lines[0]), indentOf(lines[1]))
    : indentOf(lines[0]);

  return lines
    .map(line => (indentOf(line) >= margin ? line.slice(margin) : line.trimStart()))
    .join('\n');
}

/** Rough token count (~4 characters per token). */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
