import { emptyPaper, type Paper, type Query } from "../util.js";

export function paper(overrides: Partial<Paper> = {}): Paper {
  return { ...emptyPaper(), ...overrides };
}

export function query(name: string, sourceFile = `/data/pubmed_${name}.txt`): Query {
  return { name, query: `${name} query`, sourceFile };
}

/** Builds RIS text from [code, value] pairs per record. */
export function ris(...records: Array<Array<[string, string]>>): string {
  return records
    .map((fields) => `${fields.map(([code, value]) => `${code}  - ${value}`).join("\n")}\nER  - \n`)
    .join("\n");
}
