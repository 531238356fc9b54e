import { Delimiters, RangeOptions, resolveOptions } from "./options";
import { Lexeme, Segment, splitSegments } from "./token-utils";
import { ParseError, TokenPosition, assertUnreachable } from "./util";

export type RangeToken = (
  | { type: "singleton"; value: number }
  | { type: "span"; low: number; high: number }
) & { text: string } & TokenPosition;

class SegmentState {
  index = 0;
  constructor(
    private readonly segment: Segment,
    private readonly source: string
  ) {}
  peek(): Lexeme | undefined {
    return this.segment.lexemes[this.index];
  }
  next(): Lexeme | undefined {
    const lexeme = this.peek();
    if (lexeme) this.index++;
    return lexeme;
  }
  done() {
    return this.index >= this.segment.lexemes.length;
  }
  fail(reason = "Malformed range token"): never {
    throw new ParseError(reason, this.segment.text, this.source, {
      index: this.segment.index,
      length: this.segment.length,
    });
  }
}

// A leading "-" rangeDelim reads as a sign: "-5--1" is -5 through -1.
function readOperand(state: SegmentState, rangeDelim: string): number {
  let sign = 1;
  const first = state.peek();
  if (
    first &&
    (first.type === "sign" ||
      (first.type === "rangeDelim" && rangeDelim === "-"))
  ) {
    state.next();
    if (first.text === "-") sign = -1;
  }

  const digits = state.next();
  if (!digits || digits.type !== "integer") {
    return state.fail();
  }
  const value = sign * Number(digits.text);
  if (!Number.isSafeInteger(value)) {
    return state.fail("Integer out of range in token");
  }
  // no negative zero
  return value === 0 ? 0 : value;
}

export function classifySegment(
  segment: Segment,
  source: string,
  { rangeDelim }: Delimiters
): RangeToken {
  const state = new SegmentState(segment, source);
  const base = {
    text: segment.text,
    index: segment.index,
    length: segment.length,
  };

  const first = readOperand(state, rangeDelim);
  if (state.done()) {
    return { type: "singleton", value: first, ...base };
  }

  const separator = state.next();
  if (!separator || separator.type !== "rangeDelim") {
    return state.fail();
  }
  const second = readOperand(state, rangeDelim);
  if (!state.done()) {
    return state.fail();
  }

  return {
    type: "span",
    low: Math.min(first, second),
    high: Math.max(first, second),
    ...base,
  };
}

export function tokenizeRange(
  rangeString: string,
  options?: RangeOptions
): RangeToken[] {
  const delimiters = resolveOptions(options);
  const source = rangeString.trim();
  return splitSegments(source, delimiters).map((segment) =>
    classifySegment(segment, source, delimiters)
  );
}

/**
 * Parses a range string like `"1,3,5-8"` into the set of integers it
 * denotes. Spans are inclusive and may be written in either direction.
 *
 * Every value of every span is materialized, so `"0-999999999"` allocates
 * a billion entries; bounding the input is left to the caller.
 *
 * @throws {ParseError} on the first token that isn't one or two integers
 */
export function parseRange(
  rangeString: string,
  options?: RangeOptions
): Set<number> {
  const tokens = tokenizeRange(rangeString, options);
  const values: number[] = [];
  for (const token of tokens) {
    switch (token.type) {
      case "singleton":
        values.push(token.value);
        break;
      case "span":
        for (let i = token.low; i <= token.high; i++) {
          values.push(i);
        }
        break;
      // istanbul ignore next
      default:
        assertUnreachable(token);
    }
  }
  return new Set(values.sort((a, b) => a - b));
}

/** Like `parseRange`, as an ascending array. */
export function parseRangeSorted(
  rangeString: string,
  options?: RangeOptions
): number[] {
  return Array.from(parseRange(rangeString, options));
}
