/**
 * Report pagination.
 *
 * Telegram rejects messages over 4096 characters, so long reports are
 * sent as several segments. Each segment starts with a header (the
 * continuation header after the first) followed by whole lines, each
 * terminated by "\n". Lengths are UTF-16 code units, which is what
 * Telegram counts.
 */
export function chunkLines(
  header: string,
  continuationHeader: string,
  items: readonly string[],
  maxLength: number
): string[] {
  const segments: string[] = [];
  let current = header;
  let count = 0;

  for (const item of items) {
    const line = `${item}\n`;

    if (current.length + line.length <= maxLength) {
      current += line;
      count++;
      continue;
    }

    // count is only 0 here when the very first line overflows the header
    if (count > 0) {
      segments.push(current);
      current = continuationHeader + line;
    } else {
      current = header + line;
    }
    count = 1;

    if (current.length > maxLength) {
      throw new RangeError(
        `Line of ${line.length} chars does not fit a ${maxLength}-char segment`
      );
    }
  }

  // Only send the tail if it carries at least one line
  if (count > 0) {
    segments.push(current);
  }

  return segments;
}
