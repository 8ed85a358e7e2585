/** A split source row, or the reason it could not be split. Row numbers are 1-based. */
export type SourceRow =
  | { rowNumber: number; fields: string[] }
  | { rowNumber: number; error: string };

export function isCommentOrBlank(text: string, comment: string | undefined): boolean {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return true;
  }
  return comment !== undefined && comment.length > 0 && trimmed.startsWith(comment);
}
