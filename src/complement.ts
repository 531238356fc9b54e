import { formatRange } from "./formatter";
import { ComplementOptions } from "./options";
import { parseRange } from "./parser";
import { isSafeInteger } from "./util";

function checkBound(name: string, value: number) {
  if (!isSafeInteger(value)) {
    throw new TypeError(`${name} must be a safe integer, got ${String(value)}`);
  }
}

function maxOf(values: Set<number>): number | undefined {
  let max: number | undefined;
  for (const value of values) {
    if (max === undefined || value > max) max = value;
  }
  return max;
}

/**
 * Formats the integers in `[start, end)` that are missing from `rangeString`.
 *
 * `start` defaults to 0 and `end` to one past the largest parsed value (or
 * to `start` when nothing parses, giving an empty result). An empty or
 * inverted interval yields `""` rather than an error.
 *
 * ```ts
 * complementRange("1,3,5-8,10-11,15"); // "0,2,4,9,12-14"
 * complementRange("1,3,5-8,10-11,15", { end: 20 }); // "0,2,4,9,12-14,16-19"
 * ```
 */
export function complementRange(
  rangeString: string,
  options: ComplementOptions = {}
): string {
  const { start = 0, end, ...formatOptions } = options;
  const present = parseRange(rangeString, formatOptions);

  checkBound("start", start);
  let resolvedEnd = end;
  if (resolvedEnd === undefined) {
    const max = maxOf(present);
    resolvedEnd = max === undefined ? start : max + 1;
  } else {
    checkBound("end", resolvedEnd);
  }

  const missing: number[] = [];
  for (let i = start; i < resolvedEnd; i++) {
    if (!present.has(i)) missing.push(i);
  }
  return formatRange(missing, formatOptions);
}
