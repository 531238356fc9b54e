export { parseRange, parseRangeSorted, tokenizeRange } from "./parser";
export type { RangeToken } from "./parser";
export { formatRange } from "./formatter";
export { complementRange } from "./complement";
export { rangeToTuples } from "./tuples";
export type { BoundPair } from "./tuples";
export { ints, createRangeTag } from "./tag";
export type { RangeTag } from "./tag";
export { DEFAULT_DELIM, DEFAULT_RANGE_DELIM } from "./options";
export type { RangeOptions, FormatOptions, ComplementOptions } from "./options";
export { ParseError, OptionsError, showInContext } from "./util";
export type { TokenPosition } from "./util";
