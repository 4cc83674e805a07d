import { parseNextPageQuery } from "../utils/link-header";

const base = "https://example.myshopify.com/admin/api/2025-10/products.json";

describe("parseNextPageQuery", () => {
  test("returns the next page query", () => {
    expect(
      parseNextPageQuery(`<${base}?limit=250&page_info=abc>; rel="next"`)
    ).toEqual({ limit: "250", page_info: "abc" });
  });

  test("picks next among several relations", () => {
    const header = [
      `<${base}?limit=250&page_info=prev>; rel="previous"`,
      `<${base}?limit=250&page_info=nxt>; rel="next"`,
    ].join(", ");
    expect(parseNextPageQuery(header)).toEqual({
      limit: "250",
      page_info: "nxt",
    });
  });

  test("accepts an unquoted relation", () => {
    expect(parseNextPageQuery(`<${base}?page_info=abc>; rel=next`)).toEqual({
      page_info: "abc",
    });
  });

  test.each([
    [null],
    [undefined],
    [""],
    [`<${base}?limit=250&page_info=prev>; rel="previous"`],
    [`<${base}>; rel="next"`],
    ['<not a url>; rel="next"'],
  ])("returns null for %p", (header) => {
    expect(parseNextPageQuery(header)).toBeNull();
  });
});
