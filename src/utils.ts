/**
 * Utility functions shared by the report renderer and the MCP tools.
 */

/**
 * Maximum characters for tool output to stay within MCP token limits.
 */
const MAX_RESULT_CHARS = 24000;

export interface TruncationNotice {
  truncated: true;
  showing: number;
  message: string;
}

/**
 * Serialize a payload built around a list, dropping trailing list items until it fits MCP
 * limits. `wrap` receives the kept items and, when some were dropped, a notice to merge in.
 * Binary-searches the largest prefix that fits; the output is always complete JSON.
 */
export function truncateResult<T>(
  items: readonly T[],
  wrap: (items: T[], notice?: TruncationNotice) => unknown,
  indent?: number,
): string {
  const full = JSON.stringify(wrap([...items]), null, indent);
  if (full.length <= MAX_RESULT_CHARS) return full;

  const render = (count: number): string =>
    JSON.stringify(wrap(items.slice(0, count), {
      truncated: true,
      showing: count,
      message: `Showing ${count} of ${items.length} items. Use a smaller limit to narrow results.`,
    }), null, indent);

  let lo = 0;
  let hi = items.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >>> 1;
    if (render(mid).length <= MAX_RESULT_CHARS) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return render(lo);
}

/**
 * Cap a string to maxLen characters. Longer strings keep maxLen - 3 characters plus "...".
 */
export function capString(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, Math.max(0, maxLen - 3)) + "...";
}

/** Fixed two-decimal milliseconds, right-aligned to width. */
export function formatMs(value: number, width: number): string {
  return value.toFixed(2).padStart(width);
}
