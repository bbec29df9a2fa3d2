import { describe, expect, it } from "vitest";
import { pageUrl, paginate } from "./pagination";

describe("paginate", () => {
  it("slices 25 results into pages of 10", () => {
    expect(paginate({ page: 1, pageSize: 10 }, 25)).toEqual({
      page: 1,
      pageSize: 10,
      totalCount: 25,
      totalPages: 3,
      hasNext: true,
      hasPrevious: false,
      offset: 0,
    });
    expect(paginate({ page: 3, pageSize: 10 }, 25)).toEqual({
      page: 3,
      pageSize: 10,
      totalCount: 25,
      totalPages: 3,
      hasNext: false,
      hasPrevious: true,
      offset: 20,
    });
  });

  it("has one empty page when nothing matches", () => {
    const info = paginate({ page: 1, pageSize: 10 }, 0);
    expect(info.totalPages).toBe(1);
    expect(info.hasNext).toBe(false);
    expect(info.hasPrevious).toBe(false);
  });

  it("keeps a page past the end as an empty window", () => {
    const info = paginate({ page: 9, pageSize: 10 }, 25);
    expect(info.offset).toBe(80);
    expect(info.hasNext).toBe(false);
    expect(info.hasPrevious).toBe(true);
  });

  it("fills the last page exactly", () => {
    const info = paginate({ page: 2, pageSize: 10 }, 20);
    expect(info.totalPages).toBe(2);
    expect(info.hasNext).toBe(false);
  });
});

describe("pageUrl", () => {
  it("replaces the page and keeps other parameters", () => {
    expect(
      pageUrl("http://localhost/api/posts?q=django&page=2&sort_by=oldest", 3),
    ).toBe("http://localhost/api/posts?q=django&page=3&sort_by=oldest");
  });

  it("adds a page parameter when there is none", () => {
    expect(pageUrl("http://localhost/posts?tags=python", 2)).toBe(
      "http://localhost/posts?tags=python&page=2",
    );
  });
});
