import {
  UNCATEGORIZED,
  serializePaper,
  type Hierarchy,
  type Paper,
  type PaperRecord,
  type Query,
  type QueryBuckets,
  type TagBuckets,
} from "./util.js";

export type QueryBatch = {
  query: Query;
  collection: string;
  /** already canonicalized */
  papers: Paper[];
};

export type HierarchyJson = Record<string, Record<string, Record<string, PaperRecord[]>>>;

export function ensureBuckets(h: Hierarchy, collection: string, query: string): TagBuckets {
  let queries: QueryBuckets | undefined = h.get(collection);
  if (!queries) {
    queries = new Map();
    h.set(collection, queries);
  }
  let tags = queries.get(query);
  if (!tags) {
    tags = new Map();
    queries.set(query, tags);
  }
  return tags;
}

export function appendToBucket(buckets: TagBuckets, tag: string, paper: Paper): void {
  const list = buckets.get(tag);
  if (list) {
    list.push(paper);
  } else {
    buckets.set(tag, [paper]);
  }
}

/**
 * collection -> query -> tag -> papers. A paper lands once per tag it carries;
 * untagged papers go to `uncategorized`. Buckets keep insertion order.
 */
export function buildHierarchy(batches: QueryBatch[]): Hierarchy {
  const h: Hierarchy = new Map();
  for (const { query, collection, papers } of batches) {
    const buckets = ensureBuckets(h, collection, query.name);
    for (const paper of papers) {
      if (paper.branchTags.length === 0) {
        appendToBucket(buckets, UNCATEGORIZED, paper);
        continue;
      }
      for (const tag of paper.branchTags) appendToBucket(buckets, tag, paper);
    }
  }
  return h;
}

export function flattenPapers(batches: QueryBatch[]): Paper[] {
  return batches.flatMap((b) => b.papers);
}

export function countPapers(h: Hierarchy): number {
  let n = 0;
  for (const queries of h.values()) {
    for (const tags of queries.values()) {
      for (const papers of tags.values()) n += papers.length;
    }
  }
  return n;
}

export function hierarchyToJson(h: Hierarchy): HierarchyJson {
  const out: HierarchyJson = {};
  for (const [collection, queries] of h) {
    const q: Record<string, Record<string, PaperRecord[]>> = {};
    for (const [queryName, tags] of queries) {
      const t: Record<string, PaperRecord[]> = {};
      for (const [tag, papers] of tags) t[tag] = papers.map(serializePaper);
      q[queryName] = t;
    }
    out[collection] = q;
  }
  return out;
}
