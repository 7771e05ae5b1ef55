import { asNum, isRecord } from "./util.js";

export type SizeRules = {
  chars_per_line: number;
  line_height: number;
  label_padding: number;
  node_width: number;
  node_height: number;
};

export const defaultSizeRules: SizeRules = {
  chars_per_line: 28,
  line_height: 18,
  label_padding: 24,
  node_width: 240,
  node_height: 60,
};

function positive(v: unknown): number | undefined {
  const n = asNum(v);
  return n !== undefined && n > 0 ? n : undefined;
}

/** Reads the sizing keys of a `layout:` config section; bad values fall back to defaults. */
export function mergeSizeRules(raw?: unknown): SizeRules {
  const r = isRecord(raw) ? raw : {};
  return {
    chars_per_line: Math.floor(positive(r.chars_per_line) ?? defaultSizeRules.chars_per_line) || 1,
    line_height: positive(r.line_height) ?? defaultSizeRules.line_height,
    label_padding: asNum(r.label_padding) ?? defaultSizeRules.label_padding,
    node_width: positive(r.node_width) ?? defaultSizeRules.node_width,
    node_height: positive(r.node_height) ?? defaultSizeRules.node_height,
  };
}

export function estimateLabelLines(label: string, cfg: SizeRules = defaultSizeRules): number {
  return Math.max(1, Math.ceil(label.length / cfg.chars_per_line));
}

export function estimateLabelSize(label: string, cfg: SizeRules = defaultSizeRules): { width: number; height: number } {
  return {
    width: cfg.node_width,
    height: estimateLabelLines(label, cfg) * cfg.line_height + cfg.label_padding,
  };
}
