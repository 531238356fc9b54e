import { formatRange } from "./formatter";
import { RangeOptions, resolveOptions } from "./options";
import { parseRange, tokenizeRange } from "./parser";
import { assertUnreachable } from "./util";

export type BoundPair = readonly [low: number, high: number];

/**
 * Converts a range string into inclusive `[low, high]` pairs, one per
 * maximal run, ascending. The input is normalized first, so messy input
 * like `"5,3,1-2"` gives `[[1, 3], [5, 5]]`.
 */
export function rangeToTuples(
  rangeString: string,
  options?: RangeOptions
): BoundPair[] {
  const delimiters = resolveOptions(options);
  const canonical = formatRange(parseRange(rangeString, delimiters), delimiters);
  if (!canonical) return [];

  return tokenizeRange(canonical, delimiters).map((token): BoundPair => {
    switch (token.type) {
      case "singleton":
        return [token.value, token.value];
      case "span":
        return [token.low, token.high];
      // istanbul ignore next
      default:
        return assertUnreachable(token);
    }
  });
}
