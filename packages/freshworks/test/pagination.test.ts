import { describe, expect, it, vi } from "vitest";
import { collectPages, readTotalPages, type PageResult } from "../src/pagination.js";

function pagesOf<T>(pages: Array<PageResult<T>>) {
  return vi.fn(async (page: number): Promise<PageResult<T>> => {
    const current = pages[page - 1];
    if (!current) {
      throw new Error(`unexpected page ${page}`);
    }
    return current;
  });
}

describe("readTotalPages", () => {
  it("reads a numeric total_pages", () => {
    expect(readTotalPages({ total_pages: 4 })).toBe(4);
  });

  it("defaults to 1 when metadata is missing or malformed", () => {
    expect(readTotalPages(undefined)).toBe(1);
    expect(readTotalPages(null)).toBe(1);
    expect(readTotalPages({})).toBe(1);
    expect(readTotalPages({ total_pages: "3" })).toBe(1);
    expect(readTotalPages({ total_pages: Number.NaN })).toBe(1);
  });
});

describe("collectPages", () => {
  it("fetches exactly total_pages pages and keeps fetch order", async () => {
    const fetchPage = pagesOf([
      { items: ["a", "b"], meta: { total_pages: 3 } },
      { items: ["c", "d"], meta: { total_pages: 3 } },
      { items: ["e", "f"], meta: { total_pages: 3 } }
    ]);

    const result = await collectPages(fetchPage, 100);

    expect(result).toEqual(["a", "b", "c", "d", "e", "f"]);
    expect(fetchPage).toHaveBeenCalledTimes(3);
    expect(fetchPage.mock.calls.map(([page]) => page)).toEqual([1, 2, 3]);
  });

  it("returns nothing and never fetches when maxPages is 0", async () => {
    const fetchPage = pagesOf<string>([]);

    await expect(collectPages(fetchPage, 0)).resolves.toEqual([]);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it("stops on an empty first page", async () => {
    const fetchPage = pagesOf<string>([
      { items: [], meta: { total_pages: 5 } },
      { items: ["never"], meta: { total_pages: 5 } }
    ]);

    await expect(collectPages(fetchPage, 100)).resolves.toEqual([]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("stops on an empty page even when metadata reports more", async () => {
    const fetchPage = pagesOf([
      { items: [1], meta: { total_pages: 5 } },
      { items: [], meta: { total_pages: 5 } }
    ]);

    await expect(collectPages(fetchPage, 100)).resolves.toEqual([1]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("stops after a page whose total_pages is missing", async () => {
    const fetchPage = pagesOf([
      { items: [1, 2], meta: { total_pages: 4 } },
      { items: [3, 4], meta: {} },
      { items: [5, 6], meta: { total_pages: 4 } }
    ]);

    await expect(collectPages(fetchPage, 100)).resolves.toEqual([1, 2, 3, 4]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("treats zero or negative total_pages as the last page", async () => {
    const zero = pagesOf([{ items: ["x"], meta: { total_pages: 0 } }]);
    const negative = pagesOf([{ items: ["y"], meta: { total_pages: -2 } }]);

    await expect(collectPages(zero, 100)).resolves.toEqual(["x"]);
    await expect(collectPages(negative, 100)).resolves.toEqual(["y"]);
    expect(zero).toHaveBeenCalledTimes(1);
    expect(negative).toHaveBeenCalledTimes(1);
  });

  it("returns partial data when maxPages is reached first", async () => {
    const fetchPage = pagesOf([
      { items: [1], meta: { total_pages: 10 } },
      { items: [2], meta: { total_pages: 10 } },
      { items: [3], meta: { total_pages: 10 } }
    ]);

    await expect(collectPages(fetchPage, 2)).resolves.toEqual([1, 2]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("keeps duplicates from overlapping pages", async () => {
    const fetchPage = pagesOf([
      { items: [{ id: 1 }, { id: 2 }], meta: { total_pages: 2 } },
      { items: [{ id: 2 }, { id: 3 }], meta: { total_pages: 2 } }
    ]);

    const result = await collectPages(fetchPage, 100);
    expect(result.map((item) => item.id)).toEqual([1, 2, 2, 3]);
  });

  it("propagates the fetch error unchanged", async () => {
    const failure = new Error("socket hang up");
    const fetchPage = vi.fn(async (page: number): Promise<PageResult<number>> => {
      if (page === 2) {
        throw failure;
      }
      return { items: [page], meta: { total_pages: 3 } };
    });

    await expect(collectPages(fetchPage, 100)).rejects.toBe(failure);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });
});
