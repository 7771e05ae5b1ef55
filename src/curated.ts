import { appendToBucket, ensureBuckets } from "./hierarchy.js";
import { type Hierarchy, type OverlayMap, type Paper, type TagBuckets } from "./util.js";

export type OverlayResult = {
  overlay: OverlayMap;
  /** curated items read */
  total: number;
  /** items matched to a parsed paper */
  matched: number;
  /** matched items filed into a bucket */
  placed: number;
};

export type QueryLocation = {
  collection: string;
  query: string;
  buckets: TagBuckets;
};

export function normalizeText(s: string | null | undefined): string {
  return (s ?? "").trim().toLowerCase();
}

/**
 * First paper, in encounter order, sharing the item's normalized title or DOI.
 * Linear in the corpus for every item: O(curated x total) overall. A
 * title/DOI lookup table is the way out if corpora grow well beyond tens of
 * thousands of records.
 */
export function findMatchingPaper(item: Paper, papers: Paper[]): Paper | undefined {
  const title = normalizeText(item.title);
  const doi = normalizeText(item.doi);
  for (const p of papers) {
    if (title && title === normalizeText(p.title)) return p;
    if (doi && doi === normalizeText(p.doi)) return p;
  }
  return undefined;
}

/** Query holding this exact paper object, searching the hierarchy in order. */
export function findQueryOf(h: Hierarchy, paper: Paper): QueryLocation | undefined {
  for (const [collection, queries] of h) {
    for (const [query, buckets] of queries) {
      for (const papers of buckets.values()) {
        if (papers.includes(paper)) return { collection, query, buckets };
      }
    }
  }
  return undefined;
}

export function resolveTag(tag: string, buckets: TagBuckets): string | undefined {
  const key = tag.toLowerCase();
  for (const existing of buckets.keys()) {
    if (existing.toLowerCase() === key) return existing;
  }
  return undefined;
}

/**
 * Least-populated bucket among the item's resolvable tags. On equal counts the
 * tag listed first on the curated item wins.
 */
export function selectPlacementTag(tags: string[], buckets: TagBuckets): string | undefined {
  let selected: string | undefined;
  let min = Infinity;
  for (const tag of tags) {
    const canonical = resolveTag(tag, buckets);
    if (canonical === undefined) continue;
    const count = buckets.get(canonical)?.length ?? 0;
    if (count < min) {
      min = count;
      selected = canonical;
    }
  }
  return selected;
}

export function buildOverlay(curated: Paper[], papers: Paper[], h: Hierarchy): OverlayResult {
  const overlay: OverlayMap = new Map();
  let matched = 0;
  let placed = 0;
  for (const item of curated) {
    const paper = findMatchingPaper(item, papers);
    if (!paper) continue;
    matched += 1;
    if (item.branchTags.length === 0) continue;
    const loc = findQueryOf(h, paper);
    if (!loc) continue;
    const tag = selectPlacementTag(item.branchTags, loc.buckets);
    if (tag === undefined) continue;
    appendToBucket(ensureBuckets(overlay, loc.collection, loc.query), tag, paper);
    placed += 1;
  }
  return { overlay, total: curated.length, matched, placed };
}
