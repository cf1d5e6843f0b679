/**
 * Split a command line up to the cursor into whitespace-separated words.
 */

export interface TokenizedLine {
  /** Words that end before the cursor */
  complete: string[];
  /** The word under the cursor; empty when the cursor follows whitespace */
  current: string;
}

export function tokenizeLine(line: string, cursorPosition: number): TokenizedLine {
  const point = Math.max(0, Math.min(Math.trunc(cursorPosition), line.length));
  const head = line.slice(0, point);
  const words = head.split(/\s+/).filter(word => word.length > 0);

  if (head.length === 0 || /\s$/.test(head)) {
    return { complete: words, current: '' };
  }
  return { complete: words.slice(0, -1), current: words[words.length - 1] ?? '' };
}
