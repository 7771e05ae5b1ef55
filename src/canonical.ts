import { type Paper } from "./util.js";

/** lowercased tag -> canonical display form */
export type CanonicalMap = Map<string, string>;

export function countUpper(s: string): number {
  let n = 0;
  for (const ch of s) {
    if (/\p{Lu}/u.test(ch)) n += 1;
  }
  return n;
}

/** Distinct case-variants per lowercased form, in first-seen order. */
export function collectTagVariants(tagLists: Iterable<string[]>): Map<string, string[]> {
  const variants = new Map<string, string[]>();
  for (const tags of tagLists) {
    for (const tag of tags) {
      const key = tag.toLowerCase();
      const seen = variants.get(key);
      if (!seen) {
        variants.set(key, [tag]);
      } else if (!seen.includes(tag)) {
        seen.push(tag);
      }
    }
  }
  return variants;
}

/** Most uppercase characters wins; ties keep the earliest variant. */
export function chooseCanonical(variants: string[]): string | undefined {
  let best: string | undefined;
  let bestScore = -1;
  for (const v of variants) {
    const score = countUpper(v);
    if (score > bestScore) {
      best = v;
      bestScore = score;
    }
  }
  return best;
}

export function buildCanonicalMap(tagLists: Iterable<string[]>): CanonicalMap {
  const out: CanonicalMap = new Map();
  for (const [key, variants] of collectTagVariants(tagLists)) {
    const canonical = chooseCanonical(variants);
    if (canonical !== undefined) out.set(key, canonical);
  }
  return out;
}

export function canonicalizeTags(tags: string[], map: CanonicalMap): string[] {
  return tags.map((t) => map.get(t.toLowerCase()) ?? t);
}

/**
 * Rewrites the branch tags of one query's papers in place and returns the
 * table used. Never share the table between queries.
 */
export function canonicalizePapers(papers: Paper[]): CanonicalMap {
  const map = buildCanonicalMap(papers.map((p) => p.branchTags));
  for (const p of papers) {
    p.branchTags = canonicalizeTags(p.branchTags, map);
  }
  return map;
}
