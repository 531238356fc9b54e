import { Lexeme, getLexer, splitSegments, tokenize } from "./token-utils";

const defaults = { delim: ",", rangeDelim: "-" };

function strip(lexeme: Lexeme) {
  return { type: lexeme.type, text: lexeme.text };
}

test("basic lexemes", () => {
  expect(tokenize("1, 5-8,+2", defaults).map(strip)).toEqual([
    { type: "integer", text: "1" },
    { type: "delim", text: "," },
    { type: "integer", text: "5" },
    { type: "rangeDelim", text: "-" },
    { type: "integer", text: "8" },
    { type: "delim", text: "," },
    { type: "sign", text: "+" },
    { type: "integer", text: "2" },
  ]);
});

test("unknown characters are grouped", () => {
  expect(tokenize("ab-12x", defaults).map(strip)).toEqual([
    { type: "invalid", text: "ab" },
    { type: "rangeDelim", text: "-" },
    { type: "integer", text: "12" },
    { type: "invalid", text: "x" },
  ]);
});

test("positions", () => {
  expect(tokenize("10-12", defaults)).toEqual([
    { type: "integer", text: "10", index: 0, length: 2 },
    { type: "rangeDelim", text: "-", index: 2, length: 1 },
    { type: "integer", text: "12", index: 3, length: 2 },
  ]);
});

test("custom delimiters, longest first", () => {
  const delimiters = { delim: ".", rangeDelim: ".." };
  expect(tokenize("1..3.-4", delimiters).map(strip)).toEqual([
    { type: "integer", text: "1" },
    { type: "rangeDelim", text: ".." },
    { type: "integer", text: "3" },
    { type: "delim", text: "." },
    { type: "sign", text: "-" },
    { type: "integer", text: "4" },
  ]);
});

test("segments", () => {
  const segments = splitSegments("1, 5 - 8,,x", defaults);
  expect(
    segments.map(({ text, index, length }) => ({ text, index, length }))
  ).toEqual([
    { text: "1", index: 0, length: 1 },
    { text: "5 - 8", index: 3, length: 5 },
    { text: "", index: 9, length: 0 },
    { text: "x", index: 10, length: 1 },
  ]);
  expect(segments[1].lexemes.map(strip)).toEqual([
    { type: "integer", text: "5" },
    { type: "rangeDelim", text: "-" },
    { type: "integer", text: "8" },
  ]);
  expect(splitSegments("", defaults)).toEqual([]);
});

test("whitespace delimiter wins over whitespace", () => {
  expect(tokenize("1 3-4", { delim: " ", rangeDelim: "-" }).map(strip)).toEqual(
    [
      { type: "integer", text: "1" },
      { type: "delim", text: " " },
      { type: "integer", text: "3" },
      { type: "rangeDelim", text: "-" },
      { type: "integer", text: "4" },
    ]
  );
});

test("only the default and the last custom lexer are kept", () => {
  const semi = { delim: ";", rangeDelim: ":" };
  const slash = { delim: "/", rangeDelim: ".." };

  const defaultLexer = getLexer(defaults);
  const semiLexer = getLexer(semi);
  expect(getLexer(semi)).toBe(semiLexer);

  const slashLexer = getLexer(slash);
  expect(getLexer(slash)).toBe(slashLexer);
  expect(getLexer(semi)).not.toBe(semiLexer);
  expect(getLexer(defaults)).toBe(defaultLexer);
});
