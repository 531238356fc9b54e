import { FormatOptions, resolveOptions } from "./options";
import { assertUnreachable, isSafeInteger } from "./util";

type RunState =
  | { type: "idle" }
  | { type: "open"; start: number; end: number };

function sortedUnique(integers: Iterable<number>): number[] {
  const values = new Set<number>();
  for (const value of integers) {
    if (!isSafeInteger(value)) {
      throw new TypeError(`Expected a safe integer, got ${String(value)}`);
    }
    values.add(value === 0 ? 0 : value);
  }
  return Array.from(values).sort((a, b) => a - b);
}

/**
 * Formats integers as a canonical range string: ascending, deduplicated,
 * with every maximal run of consecutive values collapsed into one span.
 *
 * ```ts
 * formatRange([1, 3, 5, 6, 7, 8, 10, 11, 15]); // "1,3,5-8,10-11,15"
 * ```
 *
 * Negative values collapse the same way, so `[-3, -2, -1]` formats as
 * `"-3--1"`.
 */
export function formatRange(
  integers: Iterable<number>,
  options: FormatOptions = {}
): string {
  const { delim, rangeDelim } = resolveOptions(options);
  const tokens: string[] = [];
  let run: RunState = { type: "idle" };

  const flush = (state: RunState) => {
    switch (state.type) {
      case "idle":
        return;
      case "open":
        tokens.push(
          state.start === state.end
            ? String(state.start)
            : `${state.start}${rangeDelim}${state.end}`
        );
        return;
      // istanbul ignore next
      default:
        assertUnreachable(state);
    }
  };

  for (const value of sortedUnique(integers)) {
    if (run.type === "idle") {
      run = { type: "open", start: value, end: value };
    } else if (value === run.end + 1) {
      run = { type: "open", start: run.start, end: value };
    } else if (value > run.end + 1) {
      flush(run);
      run = { type: "open", start: value, end: value };
    }
  }
  flush(run);

  return tokens.join(options.delimSpace ? `${delim} ` : delim);
}
