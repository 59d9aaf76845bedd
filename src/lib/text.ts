/**
 * First `end` UTF-16 code units of text, one fewer when the cut would
 * separate a surrogate pair.
 */
export function sliceText(text: string, end: number): string {
  if (end <= 0) return '';
  if (end >= text.length) return text;
  const last = text.charCodeAt(end - 1);
  const splitsPair = last >= 0xd800 && last <= 0xdbff;
  return text.slice(0, splitsPair ? end - 1 : end);
}
