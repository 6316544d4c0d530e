export const COMMENT_MARKERS = ["#", "//", "/*", "*", "<!--"] as const;

// Prefix heuristic only: any line opening with a marker is treated as a
// comment, whatever the file's language.
export function isCommentLine(line: string): boolean {
  const trimmed = line.trimStart();
  return COMMENT_MARKERS.some((marker) => trimmed.startsWith(marker));
}
