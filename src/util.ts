// istanbul ignore next
export function assertUnreachable(value: never): never {
  console.error("shouldnt have gotten (", value, ")");
  throw new Error(`unreachable`);
}

export function isSafeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

/*
 * index: position in the (trimmed) source string
 * length: length of the matched text
 * NOTE: an empty token (e.g. between two delimiters) has a length of 0,
 * but is still underlined with a single caret.
 */
export type TokenPosition = {
  index: number;
  length: number;
};

const MAX_OFFSET = 40;

export function showInContext(source: string, pos: TokenPosition): string {
  const from = Math.max(0, pos.index - MAX_OFFSET);
  const to = Math.min(source.length, pos.index + pos.length + MAX_OFFSET);
  const prefix = from > 0 ? "..." : "";
  const suffix = to < source.length ? "..." : "";
  const underline =
    " ".repeat(prefix.length + pos.index - from) +
    "^".repeat(Math.max(1, pos.length));
  return [prefix + source.slice(from, to) + suffix, underline].join("\n");
}

export class ParseError extends Error {
  constructor(
    reason: string,
    public readonly token: string,
    public readonly source: string,
    public readonly position: TokenPosition
  ) {
    super(`${reason} "${token}"\n${showInContext(source, position)}`);
    this.name = "ParseError";
  }
}

export class OptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OptionsError";
  }
}
