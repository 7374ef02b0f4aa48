import type { FreshworksPageMeta } from "./types.js";

export type PageResult<T> = {
  items: T[];
  meta?: FreshworksPageMeta | null;
};

export type FetchPage<T> = (page: number) => Promise<PageResult<T>>;

export function readTotalPages(meta: FreshworksPageMeta | null | undefined): number {
  const totalPages = meta?.total_pages;
  return typeof totalPages === "number" && Number.isFinite(totalPages) ? totalPages : 1;
}

// Walks pages in order until an empty page, the reported last page, or maxPages.
export async function collectPages<T>(fetchPage: FetchPage<T>, maxPages: number): Promise<T[]> {
  const result: T[] = [];
  let page = 1;

  while (page <= maxPages) {
    const current = await fetchPage(page);
    if (current.items.length === 0) {
      break;
    }

    result.push(...current.items);

    if (page >= readTotalPages(current.meta)) {
      break;
    }

    page += 1;
  }

  return result;
}
