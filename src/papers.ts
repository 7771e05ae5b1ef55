import { serializePaper, type Paper, type PaperRecord } from "./util.js";

export type PaperSort = "year" | "title";

export type ListOptions = {
  search?: string;
  sort?: PaperSort;
};

/** Opaque lookup for content locators (L1 values); implemented by the host. */
export interface LocatorResolver {
  isAvailable(locator: string): boolean;
}

export type AvailablePaperRecord = PaperRecord & { content_available: boolean };

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Filters on title/abstract (case-insensitive substring) and sorts: `year`
 * newest first, then title descending; `title` A-Z ignoring case. Without a
 * sort the parse order is kept.
 */
export function listPapers(papers: Paper[], opts: ListOptions = {}): PaperRecord[] {
  const needle = (opts.search ?? "").trim().toLowerCase();
  let out = needle
    ? papers.filter((p) => p.title.toLowerCase().includes(needle) || p.abstract.toLowerCase().includes(needle))
    : [...papers];
  if (opts.sort === "year") {
    out = out.sort((a, b) => (b.year ?? 0) - (a.year ?? 0) || compareText(b.title, a.title));
  } else if (opts.sort === "title") {
    out = out.sort((a, b) => compareText(a.title.toLowerCase(), b.title.toLowerCase()));
  }
  return out.map(serializePaper);
}

export function annotateAvailability(records: PaperRecord[], resolver: LocatorResolver): AvailablePaperRecord[] {
  return records.map((r) => ({
    ...r,
    content_available: r.content_locator.length > 0 && resolver.isAvailable(r.content_locator),
  }));
}
