import { canonicalizePapers } from "./canonical.js";
import { resolveCuratedFiles, resolveQueries, type MissingSource, type VisualizerConfig } from "./config.js";
import { buildOverlay, type OverlayResult } from "./curated.js";
import { buildHierarchy, flattenPapers, hierarchyToJson, type HierarchyJson, type QueryBatch } from "./hierarchy.js";
import { buildGraph, type LayoutRules } from "./layout.js";
import { collectionFromPath, parseRisText } from "./ris_parse.js";
import {
  readText,
  serializePaper,
  type Graph,
  type Hierarchy,
  type OverlayMap,
  type Paper,
  type PaperRecord,
  type Query,
} from "./util.js";

export type Logger = (msg: string) => void;

export type SourceText = {
  query: Query;
  text: string;
};

export type BuildInput = {
  sources: SourceText[];
  highlightText?: string;
  relevanceText?: string;
  layout?: Partial<LayoutRules>;
  log?: Logger;
};

export type OverlayStats = Omit<OverlayResult, "overlay">;

export type BuildStats = {
  queries: number;
  papers: number;
  highlight: OverlayStats;
  relevance: OverlayStats;
};

export type BuildResult = {
  /** every parsed paper, parse order, no dedup */
  papers: Paper[];
  hierarchy: Hierarchy;
  highlight: OverlayMap;
  relevance: OverlayMap;
  graph: Graph;
  stats: BuildStats;
  missing: MissingSource[];
};

export type BuildJson = {
  hierarchy: HierarchyJson;
  graph: Graph;
  papers: PaperRecord[];
  missing: MissingSource[];
};

const CURATED_COLLECTION = "curated";

const defaultLog: Logger = (msg) => console.error(msg);

function overlayFrom(
  text: string | undefined,
  name: string,
  papers: Paper[],
  hierarchy: Hierarchy,
  log: Logger,
): OverlayResult {
  if (text === undefined) {
    log(`${name}: no curated file`);
    return { overlay: new Map(), total: 0, matched: 0, placed: 0 };
  }
  const res = buildOverlay(parseRisText(text, CURATED_COLLECTION), papers, hierarchy);
  log(`${name}: matched ${res.matched} of ${res.total} curated papers, placed ${res.placed}`);
  return res;
}

function statsOf(r: OverlayResult): OverlayStats {
  return { total: r.total, matched: r.matched, placed: r.placed };
}

/** parse -> canonicalize (per query) -> group -> match -> layout, from in-memory texts */
export function buildFromTexts(input: BuildInput): BuildResult {
  const log = input.log ?? defaultLog;
  const batches: QueryBatch[] = input.sources.map(({ query, text }) => {
    const collection = collectionFromPath(query.sourceFile);
    const papers = parseRisText(text, collection);
    canonicalizePapers(papers);
    return { query, collection, papers };
  });
  const papers = flattenPapers(batches);
  log(`parsed ${papers.length} papers from ${batches.length} queries`);

  const hierarchy = buildHierarchy(batches);
  const highlight = overlayFrom(input.highlightText, "highlight", papers, hierarchy, log);
  const relevance = overlayFrom(input.relevanceText, "relevance", papers, hierarchy, log);
  const graph = buildGraph({
    hierarchy,
    highlight: highlight.overlay,
    relevance: relevance.overlay,
    queries: new Map(batches.map((b) => [b.query.name, b.query])),
    rules: input.layout,
  });
  log(`graph: nodes=${graph.nodes.length} edges=${graph.edges.length}`);

  return {
    papers,
    hierarchy,
    highlight: highlight.overlay,
    relevance: relevance.overlay,
    graph,
    stats: {
      queries: batches.length,
      papers: papers.length,
      highlight: statsOf(highlight),
      relevance: statsOf(relevance),
    },
    missing: [],
  };
}

/**
 * Resolves the newest files for each query and both curated sets, then builds.
 * Throws SourceUnavailableError when the source directory is missing; queries
 * without a matching file are reported in `missing`.
 */
export function buildFromConfig(cfg: VisualizerConfig, opts: { log?: Logger } = {}): BuildResult {
  const log = opts.log ?? defaultLog;
  const { queries, missing } = resolveQueries(cfg);
  for (const m of missing) {
    log(`warning: no file with prefix '${m.prefix}' for query '${m.query}'`);
  }
  const curated = resolveCuratedFiles(cfg);
  const result = buildFromTexts({
    sources: queries.map((query) => ({ query, text: readText(query.sourceFile) })),
    highlightText: curated.highlight ? readText(curated.highlight) : undefined,
    relevanceText: curated.relevance ? readText(curated.relevance) : undefined,
    layout: cfg.layout,
    log,
  });
  return { ...result, missing };
}

export function resultToJson(r: BuildResult): BuildJson {
  return {
    hierarchy: hierarchyToJson(r.hierarchy),
    graph: r.graph,
    papers: r.papers.map(serializePaper),
    missing: r.missing,
  };
}

/** Caller-owned memo of one build; the pipeline itself keeps nothing between calls. */
export class BuildCache {
  private result: BuildResult | undefined;

  constructor(private readonly loader: () => BuildResult) {}

  load(): BuildResult {
    this.result ??= this.loader();
    return this.result;
  }

  invalidate(): void {
    this.result = undefined;
  }

  get loaded(): boolean {
    return this.result !== undefined;
  }
}
