import { OptionsError } from "./util";

export interface RangeOptions {
  /** separates tokens, e.g. the `,` in `1,3,5-8` */
  delim?: string;
  /** joins the two ends of a span, e.g. the `-` in `5-8` */
  rangeDelim?: string;
}

export interface FormatOptions extends RangeOptions {
  /** write `1, 3, 5-8` instead of `1,3,5-8` */
  delimSpace?: boolean;
}

export interface ComplementOptions extends FormatOptions {
  /** inclusive */
  start?: number;
  /** exclusive; defaults to one past the largest parsed value */
  end?: number;
}

export type Delimiters = {
  delim: string;
  rangeDelim: string;
};

export const DEFAULT_DELIM = ",";
export const DEFAULT_RANGE_DELIM = "-";

const digitPattern = /[0-9]/u;

function checkDelimiter(name: string, value: string) {
  if (!value.length) {
    throw new OptionsError(`${name} must not be empty`);
  }
  if (digitPattern.test(value)) {
    throw new OptionsError(`${name} must not contain digits, got "${value}"`);
  }
  if (value === "+") {
    throw new OptionsError(`${name} must not be "+"`);
  }
}

export function resolveOptions(options: RangeOptions = {}): Delimiters {
  const delim = options.delim ?? DEFAULT_DELIM;
  const rangeDelim = options.rangeDelim ?? DEFAULT_RANGE_DELIM;
  checkDelimiter("delim", delim);
  checkDelimiter("rangeDelim", rangeDelim);
  if (delim === rangeDelim) {
    throw new OptionsError(
      `delim and rangeDelim must differ, both are "${delim}"`
    );
  }
  // "-" between tokens would swallow the sign of a negative value
  if (delim === "-") {
    throw new OptionsError(`delim must not be "-"`);
  }
  return { delim, rangeDelim };
}
