import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import { mergeLayoutRules, type LayoutRules } from "./layout.js";
import { SourceUnavailableError, asStr, die, isRecord, type Query } from "./util.js";

export type QueryConfig = {
  name: string;
  query: string;
  prefix?: string;
  file?: string;
};

export type VisualizerConfig = {
  sourceDir: string;
  curatedDir: string;
  extension: string;
  highlightPrefix: string;
  relevancePrefix: string;
  queries: QueryConfig[];
  layout: LayoutRules;
};

/** A configured query whose prefix matched no file. */
export type MissingSource = {
  query: string;
  prefix: string;
};

export type CuratedFiles = {
  highlight?: string;
  relevance?: string;
};

function parseQuery(raw: unknown, i: number): QueryConfig {
  if (!isRecord(raw)) die(`queries[${i}] must be a mapping`);
  const name = asStr(raw.name) ?? die(`queries[${i}] has no name`);
  const prefix = asStr(raw.prefix);
  const file = asStr(raw.file);
  if (!prefix && !file) die(`query '${name}' needs a prefix or a file`);
  return { name, query: asStr(raw.query) ?? name, prefix, file };
}

/** Relative paths resolve against `baseDir` (the config file's directory). */
export function parseConfig(raw: unknown, baseDir: string): VisualizerConfig {
  if (!isRecord(raw)) die("config must be a mapping");
  const sourceDir = path.resolve(baseDir, asStr(raw.source_dir) ?? die("config has no source_dir"));
  const curatedRaw = asStr(raw.curated_dir);
  const curated = isRecord(raw.curated) ? raw.curated : {};
  const rawQueries: unknown = raw.queries;
  if (!Array.isArray(rawQueries) || rawQueries.length === 0) die("config needs a non-empty queries list");
  const queries = rawQueries.map((q: unknown, i: number) => parseQuery(q, i));
  const names = new Set<string>();
  for (const q of queries) {
    if (names.has(q.name)) die(`duplicate query name '${q.name}'`);
    names.add(q.name);
  }
  return {
    sourceDir,
    curatedDir: curatedRaw ? path.resolve(baseDir, curatedRaw) : path.join(sourceDir, "manual_groupings"),
    extension: asStr(raw.file_extension) ?? ".txt",
    highlightPrefix: asStr(curated.highlight_prefix) ?? "most_cited",
    relevancePrefix: asStr(curated.relevance_prefix) ?? "most_relevant",
    queries,
    layout: mergeLayoutRules(raw.layout),
  };
}

export function loadConfig(file: string): VisualizerConfig {
  const raw = yaml.load(fs.readFileSync(file, "utf8"));
  return parseConfig(raw, path.dirname(path.resolve(file)));
}

export function assertSourceDir(dir: string): void {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new SourceUnavailableError(dir);
  }
}

/**
 * Newest regular file in `dir` named `<prefix>*<ext>`, by modification time.
 * Equal times go to the name that sorts first.
 */
export function findNewestByPrefix(dir: string, prefix: string, ext = ".txt"): string | undefined {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) return undefined;
  let best: { file: string; mtime: number } | undefined;
  for (const name of fs.readdirSync(dir).sort()) {
    if (!name.startsWith(prefix) || !name.endsWith(ext)) continue;
    const file = path.join(dir, name);
    const st = fs.statSync(file);
    if (!st.isFile()) continue;
    if (!best || st.mtimeMs > best.mtime) best = { file, mtime: st.mtimeMs };
  }
  return best ? path.resolve(best.file) : undefined;
}

export function resolveQueries(cfg: VisualizerConfig): { queries: Query[]; missing: MissingSource[] } {
  assertSourceDir(cfg.sourceDir);
  const queries: Query[] = [];
  const missing: MissingSource[] = [];
  for (const q of cfg.queries) {
    if (q.file) {
      queries.push({ name: q.name, query: q.query, sourceFile: path.resolve(cfg.sourceDir, q.file) });
      continue;
    }
    const prefix = q.prefix ?? "";
    const sourceFile = findNewestByPrefix(cfg.sourceDir, prefix, cfg.extension);
    if (sourceFile) {
      queries.push({ name: q.name, query: q.query, sourceFile });
    } else {
      missing.push({ query: q.name, prefix });
    }
  }
  return { queries, missing };
}

export function resolveCuratedFiles(cfg: VisualizerConfig): CuratedFiles {
  return {
    highlight: findNewestByPrefix(cfg.curatedDir, cfg.highlightPrefix, cfg.extension),
    relevance: findNewestByPrefix(cfg.curatedDir, cfg.relevancePrefix, cfg.extension),
  };
}
