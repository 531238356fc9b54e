import { resolveOptions } from "./options";
import { OptionsError } from "./util";

test("defaults", () => {
  expect(resolveOptions()).toEqual({ delim: ",", rangeDelim: "-" });
  expect(resolveOptions({ delim: ";" })).toEqual({ delim: ";", rangeDelim: "-" });
  expect(resolveOptions({ rangeDelim: ".." })).toEqual({
    delim: ",",
    rangeDelim: "..",
  });
});

test("invalid delimiters", () => {
  expect(() => resolveOptions({ delim: "" })).toThrow(OptionsError);
  expect(() => resolveOptions({ rangeDelim: "" })).toThrow(OptionsError);
  expect(() => resolveOptions({ delim: "1" })).toThrow(OptionsError);
  expect(() => resolveOptions({ rangeDelim: "+" })).toThrow(OptionsError);
  expect(() => resolveOptions({ delim: "-" })).toThrow(
    'delim and rangeDelim must differ, both are "-"'
  );
});

test("whitespace delimiters", () => {
  expect(resolveOptions({ delim: " " })).toEqual({ delim: " ", rangeDelim: "-" });
  expect(resolveOptions({ delim: "\n", rangeDelim: " to " })).toEqual({
    delim: "\n",
    rangeDelim: " to ",
  });
});

test("delim cannot be a minus sign", () => {
  expect(() => resolveOptions({ delim: "-", rangeDelim: ":" })).toThrow(
    'delim must not be "-"'
  );
});
