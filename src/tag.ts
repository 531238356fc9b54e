import { formatRange } from "./formatter";
import { Delimiters, RangeOptions, resolveOptions } from "./options";
import { parseRange } from "./parser";
import { isSafeInteger } from "./util";

type Interpolation = number | Iterable<number>;

export type RangeTag = (
  strs: TemplateStringsArray,
  ...xs: Interpolation[]
) => Set<number>;

function interpolate(x: Interpolation, delimiters: Delimiters): string {
  if (typeof x === "number") {
    if (!isSafeInteger(x)) {
      throw new TypeError(`Cannot interpolate ${x} into a range`);
    }
    return String(x);
  }
  return formatRange(x, delimiters);
}

export function createRangeTag(options?: RangeOptions): RangeTag {
  const delimiters = resolveOptions(options);
  return (strs, ...xs) => {
    let source = strs.raw[0];
    for (const [i, x] of xs.entries()) {
      source += interpolate(x, delimiters) + strs.raw[i + 1];
    }
    return parseRange(source, delimiters);
  };
}

/**
 * ```ts
 * const last = 12;
 * ints`1-3,${[5, 6, 7]},10-${last}`; // Set {1, 2, 3, 5, 6, 7, 10, 11, 12}
 * ```
 */
export const ints = createRangeTag();
