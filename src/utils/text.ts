/**
 * Collapse whitespace and shorten `text` to at most `width` characters,
 * cutting on a word boundary and appending `placeholder` when truncated.
 */
export function shorten(
  text: string,
  width: number,
  placeholder = "..."
): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length <= width) return collapsed;

  const words = collapsed.split(" ");
  let result = "";
  for (const word of words) {
    const candidate = result ? `${result} ${word}` : word;
    if (candidate.length + placeholder.length > width) break;
    result = candidate;
  }

  if (!result) return placeholder.slice(0, width);
  return `${result}${placeholder}`;
}

/** Truncate to `size` characters without word handling. Used for table cells. */
export function truncate(text: string, size: number): string {
  return text.length > size ? text.slice(0, size) : text;
}
