import { stringifyForDisplay } from "../index.js";

test("prints undefined values instead of dropping them", () => {
  expect(stringifyForDisplay({ title: undefined, pages: 3 })).toBe(
    '{"title":"<undefined>","pages":3}'
  );
});

test("prints values JSON cannot represent", () => {
  const book: Record<string, unknown> = { title: "One" };
  book.self = book;

  expect(stringifyForDisplay(book)).toBe("<non-serializable>");
  expect(stringifyForDisplay({ count: BigInt(1) })).toBe("<non-serializable>");
});

test("falls back to String for values without a JSON form", () => {
  expect(stringifyForDisplay(undefined)).toBe("<undefined>");
  expect(stringifyForDisplay(Symbol("book"))).toBe("Symbol(book)");
});
