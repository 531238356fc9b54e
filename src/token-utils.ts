import moo from "moo";
import { DEFAULT_DELIM, DEFAULT_RANGE_DELIM, Delimiters } from "./options";
import { TokenPosition } from "./util";

const lexemeTypes = [
  "space",
  "integer",
  "sign",
  "delim",
  "rangeDelim",
  "invalid",
] as const;

export type LexemeType = typeof lexemeTypes[number];

export type Lexeme = { type: LexemeType; text: string } & TokenPosition;

/*
 * A segment is everything between two `delim` lexemes, i.e. the raw text
 * of one range token before it has been classified.
 */
export type Segment = {
  text: string;
  lexemes: Lexeme[];
} & TokenPosition;

function isLexemeType(type: string | undefined): type is LexemeType {
  return lexemeTypes.some((t) => t === type);
}

const whitespacePattern = /\s/;

function compile({ delim, rangeDelim }: Delimiters): moo.Lexer {
  const rules: moo.Rules = {};
  // delimiters come first, longest first, so that e.g. ".." wins over "."
  // and a " " delim wins over whitespace
  const delimiters: Array<[LexemeType, string]> = [
    ["delim", delim],
    ["rangeDelim", rangeDelim],
  ];
  delimiters.sort((a, b) => b[1].length - a[1].length);
  for (const [type, value] of delimiters) {
    rules[type] = { match: value, lineBreaks: value.includes("\n") };
  }
  // with a whitespace delimiter, stray whitespace is not skipped
  if (!whitespacePattern.test(delim + rangeDelim)) {
    rules.space = { match: /\s+/, lineBreaks: true };
  }
  rules.integer = /[0-9]+/;
  // a sign that collides with rangeDelim is resolved by the parser instead
  const signs = ["+", "-"].filter((s) => s !== rangeDelim);
  if (signs.length) {
    rules.sign = signs;
  }
  rules.invalid = moo.fallback;
  return moo.compile(rules);
}

function lexerKey({ delim, rangeDelim }: Delimiters) {
  return `${delim}\u0000${rangeDelim}`;
}

const defaultKey = lexerKey({
  delim: DEFAULT_DELIM,
  rangeDelim: DEFAULT_RANGE_DELIM,
});

// only the default lexer and the most recently used custom one are kept
let defaultLexer: moo.Lexer | null = null;
let lastLexer: { key: string; lexer: moo.Lexer } | null = null;

export function getLexer(delimiters: Delimiters): moo.Lexer {
  const key = lexerKey(delimiters);
  if (key === defaultKey) {
    if (!defaultLexer) defaultLexer = compile(delimiters);
    return defaultLexer;
  }
  if (!lastLexer || lastLexer.key !== key) {
    lastLexer = { key, lexer: compile(delimiters) };
  }
  return lastLexer.lexer;
}

export function tokenize(source: string, delimiters: Delimiters): Lexeme[] {
  const lexer = getLexer(delimiters);
  const lexemes: Lexeme[] = [];
  lexer.reset(source);
  for (const token of lexer) {
    // istanbul ignore next
    if (!isLexemeType(token.type)) {
      throw new Error(`unknown lexeme type ${token.type}`);
    }
    if (token.type === "space") continue;
    lexemes.push({
      type: token.type,
      text: token.text,
      index: token.offset,
      length: token.text.length,
    });
  }
  return lexemes;
}

export function splitSegments(
  source: string,
  delimiters: Delimiters
): Segment[] {
  if (!source.length) return [];

  const segments: Segment[] = [];
  let start = 0;
  let lexemes: Lexeme[] = [];
  const flush = (end: number) => {
    const raw = source.slice(start, end);
    const leading = raw.length - raw.trimStart().length;
    const text = raw.trim();
    segments.push({
      text,
      lexemes,
      index: start + leading,
      length: text.length,
    });
  };

  for (const lexeme of tokenize(source, delimiters)) {
    if (lexeme.type === "delim") {
      flush(lexeme.index);
      start = lexeme.index + lexeme.length;
      lexemes = [];
    } else {
      lexemes.push(lexeme);
    }
  }
  flush(source.length);

  return segments;
}
