import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  findNewestByPrefix,
  loadConfig,
  parseConfig,
  resolveCuratedFiles,
  resolveQueries,
} from "../config.js";
import { ConfigError, SourceUnavailableError } from "../util.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "litgraph-config-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function touch(name: string, mtimeSec: number, body = ""): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, body, "utf8");
  fs.utimesSync(file, mtimeSec, mtimeSec);
  return file;
}

describe("parseConfig", () => {
  it("fills defaults and resolves paths against the base directory", () => {
    const cfg = parseConfig({ source_dir: "src_files", queries: [{ name: "Q", prefix: "pubmed" }] }, "/base");
    expect(cfg.sourceDir).toBe(path.resolve("/base", "src_files"));
    expect(cfg.curatedDir).toBe(path.join(path.resolve("/base", "src_files"), "manual_groupings"));
    expect(cfg.extension).toBe(".txt");
    expect(cfg.highlightPrefix).toBe("most_cited");
    expect(cfg.relevancePrefix).toBe("most_relevant");
    expect(cfg.queries).toEqual([{ name: "Q", query: "Q", prefix: "pubmed", file: undefined }]);
    expect(cfg.layout.level_gap).toBe(320);
  });

  it("reads curated prefixes and layout overrides", () => {
    const cfg = parseConfig(
      {
        source_dir: "/data",
        curated_dir: "picks",
        file_extension: ".ris",
        curated: { highlight_prefix: "top", relevance_prefix: "best" },
        queries: [{ name: "Q", query: "a AND b", file: "export.ris" }],
        layout: { query_pitch: 250 },
      },
      "/base",
    );
    expect(cfg.curatedDir).toBe(path.resolve("/base", "picks"));
    expect(cfg.extension).toBe(".ris");
    expect(cfg.highlightPrefix).toBe("top");
    expect(cfg.relevancePrefix).toBe("best");
    expect(cfg.queries[0]).toEqual({ name: "Q", query: "a AND b", prefix: undefined, file: "export.ris" });
    expect(cfg.layout.query_pitch).toBe(250);
  });

  const invalid: Array<[string, unknown, string]> = [
    ["a non-mapping document", "just text", "config must be a mapping"],
    ["a missing source_dir", { queries: [{ name: "Q", prefix: "p" }] }, "config has no source_dir"],
    ["an empty query list", { source_dir: "s", queries: [] }, "config needs a non-empty queries list"],
    ["a query without a name", { source_dir: "s", queries: [{ prefix: "p" }] }, "queries[0] has no name"],
    ["a query without prefix or file", { source_dir: "s", queries: [{ name: "Q" }] }, "query 'Q' needs a prefix or a file"],
    [
      "duplicate query names",
      { source_dir: "s", queries: [{ name: "Q", prefix: "a" }, { name: "Q", prefix: "b" }] },
      "duplicate query name 'Q'",
    ],
  ];

  it.each(invalid)("rejects %s", (_label, raw, message) => {
    expect(() => parseConfig(raw, "/base")).toThrow(ConfigError);
    expect(() => parseConfig(raw, "/base")).toThrow(message);
  });
});

describe("loadConfig", () => {
  it("parses YAML relative to the config file", () => {
    const file = path.join(dir, "conf", "graph.yaml");
    fs.mkdirSync(path.dirname(file));
    fs.writeFileSync(
      file,
      ["source_dir: ../exports", "queries:", "  - name: NLP", "    prefix: pubmed", "layout:", "  tag_gap: 12", ""].join("\n"),
      "utf8",
    );
    const cfg = loadConfig(file);
    expect(cfg.sourceDir).toBe(path.join(dir, "exports"));
    expect(cfg.queries.map((q) => q.name)).toEqual(["NLP"]);
    expect(cfg.layout.tag_gap).toBe(12);
  });
});

describe("findNewestByPrefix", () => {
  it("picks the most recently modified matching file", () => {
    touch("pubmed_old.txt", 1_000);
    const newest = touch("pubmed_new.txt", 2_000);
    touch("pubmed_newer.csv", 3_000);
    touch("scopus_x.txt", 4_000);
    fs.mkdirSync(path.join(dir, "pubmed_dir.txt"));
    expect(findNewestByPrefix(dir, "pubmed")).toBe(newest);
  });

  it("breaks equal times by name", () => {
    const first = touch("pubmed_a.txt", 1_000);
    touch("pubmed_b.txt", 1_000);
    expect(findNewestByPrefix(dir, "pubmed")).toBe(first);
  });

  it("returns undefined for no match or a missing directory", () => {
    expect(findNewestByPrefix(dir, "pubmed")).toBeUndefined();
    expect(findNewestByPrefix(path.join(dir, "nope"), "pubmed")).toBeUndefined();
  });
});

describe("resolveQueries", () => {
  it("throws when the source directory is missing", () => {
    const cfg = parseConfig({ source_dir: "missing", queries: [{ name: "Q", prefix: "p" }] }, dir);
    expect(() => resolveQueries(cfg)).toThrow(SourceUnavailableError);
    expect(() => resolveQueries(cfg)).toThrow(`Source directory not available: ${path.join(dir, "missing")}`);
  });

  it("resolves prefixes and explicit files, reporting unmatched prefixes", () => {
    const pubmed = touch("pubmed_1.txt", 1_000);
    const cfg = parseConfig(
      {
        source_dir: ".",
        queries: [
          { name: "A", query: "a", prefix: "pubmed" },
          { name: "B", prefix: "scopus" },
          { name: "C", file: "fixed.ris" },
        ],
      },
      dir,
    );
    expect(resolveQueries(cfg)).toEqual({
      queries: [
        { name: "A", query: "a", sourceFile: pubmed },
        { name: "C", query: "C", sourceFile: path.join(dir, "fixed.ris") },
      ],
      missing: [{ query: "B", prefix: "scopus" }],
    });
  });
});

describe("resolveCuratedFiles", () => {
  it("finds both curated sets and tolerates a missing directory", () => {
    const cited = touch("manual_groupings/most_cited_v1.txt", 1_000);
    const cfg = parseConfig({ source_dir: ".", queries: [{ name: "Q", prefix: "p" }] }, dir);
    expect(resolveCuratedFiles(cfg)).toEqual({ highlight: cited, relevance: undefined });
    fs.rmSync(path.join(dir, "manual_groupings"), { recursive: true });
    expect(resolveCuratedFiles(cfg)).toEqual({ highlight: undefined, relevance: undefined });
  });
});
