import path from "path";
import { pathToFileURL } from "url";
import { emptyPaper, readText, serializePaper, writeText, type Paper, type PaperId } from "./util.js";

export type FieldCode =
  | "TI" | "PY" | "AB" | "AU" | "DO" | "N1" | "RN" | "L1"
  | "T2" | "VL" | "IS" | "SP" | "UR" | "KW" | "ID" | "LB";

type FieldSetter = (p: Paper, value: string) => void;

// `ER` alone on a line; the usual `ER  -` form is the same sentinel.
const RECORD_END = /^ER(?:[ \t]+-)?[ \t]*$/m;
const FIELD_LINE = /^([A-Z0-9]{2,3})\s+-\s+(.+)$/;

export function splitTerms(value: string): string[] {
  return value
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

export function parseIdentifier(value: string): PaperId {
  if (/^[+-]?\d+$/.test(value)) {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
  }
  return value;
}

function stripTrailingEr(value: string): string {
  const v = value.trim();
  return v.endsWith("ER") ? v.slice(0, -2).trim() : v;
}

const FIELD_SETTERS: Record<FieldCode, FieldSetter> = {
  TI: (p, v) => { p.title = v; },
  PY: (p, v) => {
    const m = v.match(/\d{4}/);
    if (m) p.year = Number(m[0]);
  },
  AB: (p, v) => { p.abstract = v; },
  AU: (p, v) => { p.authors.push(v); },
  DO: (p, v) => { p.doi = v; },
  N1: (p, v) => { p.uniqueSearchTerms = splitTerms(v); },
  RN: (p, v) => { p.branchTags = splitTerms(stripTrailingEr(v)); },
  L1: (p, v) => { p.contentLocator = v; },
  T2: (p, v) => { p.journal = v; },
  VL: (p, v) => { p.volume = v; },
  IS: (p, v) => { p.issue = v; },
  SP: (p, v) => { p.pages = v; },
  UR: (p, v) => { p.url = v; },
  KW: (p, v) => { p.keywords.push(v); },
  ID: (p, v) => { p.id = parseIdentifier(v); },
  LB: (p, v) => {
    if (p.id === null) p.id = parseIdentifier(v);
  },
};

function isFieldCode(code: string): code is FieldCode {
  return Object.prototype.hasOwnProperty.call(FIELD_SETTERS, code);
}

export function splitRecords(text: string): string[] {
  return text
    .replace(/\r\n?/g, "\n")
    .split(RECORD_END)
    .filter((r) => r.trim().length > 0);
}

/** Groups a record's lines into (code, value) pairs; continuation lines join with "\n". */
export function readFields(record: string): Array<[string, string]> {
  const fields: Array<[string, string]> = [];
  let code: string | undefined;
  let lines: string[] = [];
  const flush = () => {
    if (code !== undefined) fields.push([code, lines.join("\n")]);
  };
  for (const raw of record.trim().split("\n")) {
    const line = raw.trimEnd();
    if (!line) continue;
    const m = line.match(FIELD_LINE);
    if (m) {
      flush();
      code = m[1];
      lines = [m[2]];
    } else if (code !== undefined) {
      lines.push(line);
    }
  }
  flush();
  return fields;
}

export function parseRecord(record: string): Paper {
  const paper = emptyPaper();
  for (const [code, value] of readFields(record)) {
    if (!isFieldCode(code)) continue;
    FIELD_SETTERS[code](paper, value.trim());
  }
  return paper;
}

/**
 * Parses one export file's text. Records without a title are dropped; papers
 * without an ID/LB get `paper_<n>` from a counter local to this call.
 */
export function parseRisText(text: string, collection: string): Paper[] {
  const papers: Paper[] = [];
  let fallback = 1;
  for (const record of splitRecords(text)) {
    const paper = parseRecord(record);
    if (!paper.title) continue;
    paper.collection = collection;
    if (paper.id === null) {
      paper.id = `paper_${fallback}`;
      fallback += 1;
    }
    papers.push(paper);
  }
  return papers;
}

export function collectionFromPath(file: string): string {
  const stem = path.parse(file).name;
  return stem.split("_")[0] || "unknown";
}

export function parseRisFile(file: string): { collection: string; papers: Paper[] } {
  const collection = collectionFromPath(file);
  const text = readText(file);
  return { collection, papers: parseRisText(text, collection) };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2];
  const output = process.argv[3] ?? "-";
  const { collection, papers } = parseRisFile(input);
  const data = JSON.stringify(papers.map(serializePaper), null, 2);
  if (output === "-") {
    process.stdout.write(data);
  } else {
    writeText(output, data);
  }
  console.error(`ris_parse: collection=${collection} papers=${papers.length}`);
}
