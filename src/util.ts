import fs from "fs";

export type PaperId = number | string;

export type Paper = {
  id: PaperId | null;
  title: string;
  year: number | null;
  abstract: string;
  authors: string[];
  doi: string;
  uniqueSearchTerms: string[];
  branchTags: string[];
  contentLocator: string;
  collection: string;
  journal: string;
  volume: string;
  issue: string;
  pages: string;
  url: string;
  keywords: string[];
};

export type PaperRecord = {
  id: PaperId | null;
  title: string;
  year: number | null;
  abstract: string;
  authors: string[];
  doi: string;
  unique_search_terms: string[];
  branch_tags: string[];
  content_locator: string;
  collection: string;
  journal: string;
  volume: string;
  issue: string;
  pages: string;
  url: string;
  keywords: string[];
};

export type Query = {
  name: string;
  query: string;
  sourceFile: string;
};

/** canonical tag -> papers, insertion ordered */
export type TagBuckets = Map<string, Paper[]>;
export type QueryBuckets = Map<string, TagBuckets>;
/** collection -> query -> canonical tag -> papers */
export type Hierarchy = Map<string, QueryBuckets>;
/** Same nesting as Hierarchy, holding only curated placements. */
export type OverlayMap = Hierarchy;

export const UNCATEGORIZED = "uncategorized";

export type NodeType =
  | "collection"
  | "query"
  | "tag"
  | "curated-highlight"
  | "uncategorized"
  | "aggregate-highlight"
  | "aggregate-relevant";

export type Point = { x: number; y: number };

export type NodeData = {
  label: string;
  collection?: string;
  query_name?: string;
  query?: string;
  tag?: string;
  papers?: PaperRecord[];
  paper_count?: number;
};

export type GraphNode = {
  id: string;
  type: NodeType;
  /** centre of the node */
  position: Point;
  width: number;
  height: number;
  data: NodeData;
};

export type EdgeStyle = "smoothstep";

export type GraphEdge = {
  id: string;
  source: string;
  target: string;
  type: EdgeStyle;
};

export type Graph = {
  nodes: GraphNode[];
  edges: GraphEdge[];
};

/** Raised when the primary source directory itself is missing. */
export class SourceUnavailableError extends Error {
  constructor(readonly dir: string) {
    super(`Source directory not available: ${dir}`);
    this.name = "SourceUnavailableError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function die(msg: string): never {
  throw new ConfigError(msg);
}

export function emptyPaper(): Paper {
  return {
    id: null,
    title: "",
    year: null,
    abstract: "",
    authors: [],
    doi: "",
    uniqueSearchTerms: [],
    branchTags: [],
    contentLocator: "",
    collection: "",
    journal: "",
    volume: "",
    issue: "",
    pages: "",
    url: "",
    keywords: [],
  };
}

export function serializePaper(p: Paper): PaperRecord {
  return {
    id: p.id,
    title: p.title,
    year: p.year,
    abstract: p.abstract,
    authors: [...p.authors],
    doi: p.doi,
    unique_search_terms: [...p.uniqueSearchTerms],
    branch_tags: [...p.branchTags],
    content_locator: p.contentLocator,
    collection: p.collection,
    journal: p.journal,
    volume: p.volume,
    issue: p.issue,
    pages: p.pages,
    url: p.url,
    keywords: [...p.keywords],
  };
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

export function asStr(v: unknown): string | undefined {
  if (typeof v === "string" && v.trim().length > 0) return v.trim();
  return undefined;
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}
