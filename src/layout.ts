import { estimateLabelSize, mergeSizeRules, type SizeRules } from "./size.js";
import {
  UNCATEGORIZED,
  asNum,
  isRecord,
  serializePaper,
  type Graph,
  type GraphEdge,
  type GraphNode,
  type Hierarchy,
  type NodeData,
  type NodeType,
  type OverlayMap,
  type Paper,
  type PaperId,
  type Point,
  type Query,
} from "./util.js";

const SPACING_KEYS = [
  "origin_x",
  "origin_y",
  "collection_pitch",
  "level_gap",
  "query_pitch",
  "tag_gap",
  "highlight_offset_x",
  "uncategorized_offset_y",
  "aggregate_offset_x",
  "relevant_offset_x",
] as const;

type SpacingKey = (typeof SPACING_KEYS)[number];

export type LayoutRules = SizeRules & Record<SpacingKey, number>;

export type LayoutInput = {
  hierarchy: Hierarchy;
  highlight?: OverlayMap;
  relevance?: OverlayMap;
  /** query name -> query, for the query string shown on query nodes */
  queries?: Map<string, Query>;
  rules?: Partial<LayoutRules>;
};

const defaultSpacing: Record<SpacingKey, number> = {
  origin_x: 100,
  origin_y: 50,
  collection_pitch: 900,
  level_gap: 320,
  query_pitch: 400,
  tag_gap: 24,
  highlight_offset_x: 300,
  uncategorized_offset_y: 220,
  aggregate_offset_x: 900,
  relevant_offset_x: 300,
};

export const HIGHLIGHT_LABEL = "Most cited (or of interest)";
export const UNCATEGORIZED_LABEL = "Found outside search";
export const RELEVANT_LABEL = "Most relevant";

export function mergeLayoutRules(raw?: unknown): LayoutRules {
  const r = isRecord(raw) ? raw : {};
  const spacing = { ...defaultSpacing };
  for (const key of SPACING_KEYS) {
    const v = asNum(r[key]);
    if (v !== undefined) spacing[key] = v;
  }
  return { ...mergeSizeRules(r), ...spacing };
}

/** `AND <tag>`, without doubling a prefix the tag already carries. */
export function tagLabel(tag: string): string {
  let clean = tag.trim();
  if (clean.toUpperCase().startsWith("AND ")) clean = clean.slice(4).trim();
  return `AND ${clean}`;
}

export function compareTags(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la < lb) return -1;
  if (la > lb) return 1;
  return 0;
}

/**
 * First occurrence per identifier wins; papers without one are always kept.
 * Fallback `paper_<n>` ids restart with every parsed file, so two files of one
 * collection can hand the same fallback id to different papers and the later
 * one is dropped here. Giving exports explicit ID/LB fields avoids it.
 */
export function dedupeById(papers: Paper[]): Paper[] {
  const seen = new Set<PaperId>();
  const out: Paper[] = [];
  for (const p of papers) {
    if (p.id === null) {
      out.push(p);
      continue;
    }
    if (seen.has(p.id)) continue;
    seen.add(p.id);
    out.push(p);
  }
  return out;
}

function withPapers(data: NodeData, papers: Paper[]): NodeData {
  return { ...data, papers: papers.map(serializePaper), paper_count: papers.length };
}

export function buildGraph(input: LayoutInput): Graph {
  const cfg = mergeLayoutRules(input.rules);
  const nodes: GraphNode[] = [];
  const edges: GraphEdge[] = [];
  const counters = new Map<NodeType, number>();

  const addNode = (type: NodeType, position: Point, data: NodeData, height = cfg.node_height): GraphNode => {
    const n = (counters.get(type) ?? 0) + 1;
    counters.set(type, n);
    const node: GraphNode = { id: `${type}_${n}`, type, position, width: cfg.node_width, height, data };
    nodes.push(node);
    return node;
  };
  const link = (source: GraphNode, target: GraphNode): void => {
    edges.push({ id: `${source.id}-${target.id}`, source: source.id, target: target.id, type: "smoothstep" });
  };

  let ci = 0;
  for (const [collection, queries] of input.hierarchy) {
    const cpos = { x: cfg.origin_x, y: cfg.origin_y + ci * cfg.collection_pitch };
    ci += 1;
    const collectionNode = addNode("collection", cpos, { label: collection.toUpperCase(), collection });

    const highlightNodes: GraphNode[] = [];
    const highlightPapers: Paper[] = [];
    const uncategorized: Paper[] = [];
    const relevant: Paper[] = [];
    let firstQueryX: number | undefined;

    let qi = 0;
    for (const [queryName, buckets] of queries) {
      const qpos = {
        x: cpos.x + cfg.level_gap,
        y: cpos.y + (qi - (queries.size - 1) / 2) * cfg.query_pitch,
      };
      qi += 1;
      firstQueryX ??= qpos.x;
      const queryNode = addNode("query", qpos, {
        label: queryName,
        query_name: queryName,
        query: input.queries?.get(queryName)?.query ?? queryName,
      });
      link(collectionNode, queryNode);

      const tags = [...buckets.keys()].filter((t) => t !== UNCATEGORIZED).sort(compareTags);
      const sizes = tags.map((t) => estimateLabelSize(tagLabel(t), cfg));
      const stack = sizes.reduce((sum, s) => sum + s.height, 0) + cfg.tag_gap * Math.max(0, tags.length - 1);
      let cursor = qpos.y - stack / 2;
      const tagNodes: Array<{ tag: string; node: GraphNode }> = [];
      tags.forEach((tag, i) => {
        const height = sizes[i].height;
        const papers = buckets.get(tag) ?? [];
        const node = addNode(
          "tag",
          { x: qpos.x + cfg.level_gap, y: cursor + height / 2 },
          withPapers({ label: tagLabel(tag), tag, query_name: queryName }, papers),
          height,
        );
        cursor += height + cfg.tag_gap;
        link(queryNode, node);
        tagNodes.push({ tag, node });
      });

      const curated = input.highlight?.get(collection)?.get(queryName);
      for (const { tag, node } of tagNodes) {
        const papers = curated?.get(tag) ?? [];
        if (papers.length === 0) continue;
        const g = addNode(
          "curated-highlight",
          { x: node.position.x + cfg.highlight_offset_x, y: node.position.y },
          withPapers({ label: HIGHLIGHT_LABEL, tag, query_name: queryName }, papers),
        );
        link(node, g);
        highlightNodes.push(g);
        highlightPapers.push(...papers);
      }

      uncategorized.push(...(buckets.get(UNCATEGORIZED) ?? []));
      for (const papers of input.relevance?.get(collection)?.get(queryName)?.values() ?? []) {
        relevant.push(...papers);
      }
    }

    let uncategorizedNode: GraphNode | undefined;
    if (uncategorized.length > 0) {
      uncategorizedNode = addNode(
        "uncategorized",
        { x: cpos.x, y: cpos.y + cfg.uncategorized_offset_y },
        withPapers({ label: UNCATEGORIZED_LABEL, collection }, uncategorized),
      );
    }

    const aggregatePos = { x: (firstQueryX ?? cpos.x + cfg.level_gap) + cfg.aggregate_offset_x, y: cpos.y };
    let highlightAggregate: GraphNode | undefined;
    if (highlightNodes.length > 0) {
      highlightAggregate = addNode(
        "aggregate-highlight",
        aggregatePos,
        withPapers({ label: HIGHLIGHT_LABEL, collection }, dedupeById([...highlightPapers, ...uncategorized])),
      );
      for (const g of highlightNodes) link(g, highlightAggregate);
      if (uncategorizedNode) link(uncategorizedNode, highlightAggregate);
    }

    const relevantUnique = dedupeById(relevant);
    if (relevantUnique.length > 0) {
      const relevantNode = addNode(
        "aggregate-relevant",
        { x: aggregatePos.x + cfg.relevant_offset_x, y: aggregatePos.y },
        withPapers({ label: RELEVANT_LABEL, collection }, relevantUnique),
      );
      if (highlightAggregate) link(highlightAggregate, relevantNode);
    }
  }

  return { nodes, edges };
}

export function graphBounds(graph: Graph): { x0: number; y0: number; x1: number; y1: number } | undefined {
  if (graph.nodes.length === 0) return undefined;
  return {
    x0: Math.min(...graph.nodes.map((n) => n.position.x - n.width / 2)),
    y0: Math.min(...graph.nodes.map((n) => n.position.y - n.height / 2)),
    x1: Math.max(...graph.nodes.map((n) => n.position.x + n.width / 2)),
    y1: Math.max(...graph.nodes.map((n) => n.position.y + n.height / 2)),
  };
}
