import { describe, it, expect, vi } from "vitest";
import { paginate } from "./pagination.js";
import type { ListOptions } from "../core/types.js";

function pages(data: string[][]) {
  return vi.fn(async (page: ListOptions) => {
    const current = page.pageNumber ?? 1;
    return {
      items: data[current - 1] ?? [],
      pagination: {
        currentPage: current,
        previousPage: current - 1,
        nextPage: current < data.length ? current + 1 : 0,
      },
    };
  });
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) {
    out.push(item);
  }
  return out;
}

describe("paginate", () => {
  it("should yield every item of every page in order", async () => {
    const fetchPage = pages([["a", "b"], ["c"], ["d", "e"]]);

    expect(await collect(paginate(fetchPage, { pageSize: 2 }))).toEqual(["a", "b", "c", "d", "e"]);
    expect(fetchPage.mock.calls.map(([page]) => page)).toEqual([
      { pageNumber: 1, pageSize: 2 },
      { pageNumber: 2, pageSize: 2 },
      { pageNumber: 3, pageSize: 2 },
    ]);
  });

  it("should stop after a single page without a next page", async () => {
    const fetchPage = pages([["only"]]);
    expect(await collect(paginate(fetchPage))).toEqual(["only"]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("should throw once maxPages is reached", async () => {
    const fetchPage = pages([["a"], ["b"], ["c"]]);
    await expect(collect(paginate(fetchPage, { maxPages: 2 }))).rejects.toThrow(
      "pagination limit reached: 2 pages. Narrow the query or raise maxPages."
    );
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("should detect a server that points back to a page it already served", async () => {
    const fetchPage = vi.fn(async (page: ListOptions) => ({
      items: [String(page.pageNumber)],
      pagination: { currentPage: page.pageNumber ?? 1, previousPage: 0, nextPage: 1 },
    }));

    await expect(collect(paginate(fetchPage))).rejects.toThrow(
      "pagination cycle detected: page 1 was requested twice"
    );
  });
});
