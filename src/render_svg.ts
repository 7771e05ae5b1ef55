import fs from "fs";
import { pathToFileURL } from "url";
import { graphBounds } from "./layout.js";
import { defaultSizeRules } from "./size.js";
import { readText, writeText, type Graph, type GraphEdge, type GraphNode, type Point } from "./util.js";

const PAD = 40;
const CHARS_PER_LINE = defaultSizeRules.chars_per_line;
const LINE_H = defaultSizeRules.line_height;

export function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Hard-wraps a label into chunks of at most `width` characters, breaking on spaces when possible. */
export function wrapLabel(label: string, width = CHARS_PER_LINE): string[] {
  const lines: string[] = [];
  let cur = "";
  for (const word of label.split(/\s+/).filter((w) => w.length > 0)) {
    let w = word;
    while (w.length > width) {
      if (cur) {
        lines.push(cur);
        cur = "";
      }
      lines.push(w.slice(0, width));
      w = w.slice(width);
    }
    if (!w) continue;
    if (!cur) {
      cur = w;
    } else if (cur.length + 1 + w.length <= width) {
      cur = `${cur} ${w}`;
    } else {
      lines.push(cur);
      cur = w;
    }
  }
  if (cur) lines.push(cur);
  return lines.length > 0 ? lines : [""];
}

function renderNode(n: GraphNode): string {
  const x = n.position.x - n.width / 2;
  const y = n.position.y - n.height / 2;
  const text = n.data.paper_count !== undefined ? `${n.data.label} (${n.data.paper_count})` : n.data.label;
  const lines = wrapLabel(text);
  const top = n.position.y - ((lines.length - 1) * LINE_H) / 2;
  const tspans = lines
    .map((ln, i) => `<tspan x="${n.position.x}" y="${top + i * LINE_H}">${esc(ln)}</tspan>`)
    .join("");
  return `\n    <g class="node ${n.type}" id="${esc(n.id)}">\n      <rect x="${x}" y="${y}" width="${n.width}" height="${n.height}" rx="8" ry="8"/>\n      <text text-anchor="middle" dominant-baseline="middle">${tspans}</text>\n    </g>`;
}

function edgePoints(s: GraphNode, t: GraphNode): Point[] {
  const p0 = { x: s.position.x + s.width / 2, y: s.position.y };
  const p1 = { x: t.position.x - t.width / 2, y: t.position.y };
  if (p0.y === p1.y) return [p0, p1];
  const mx = Math.round((p0.x + p1.x) / 2);
  return [p0, { x: mx, y: p0.y }, { x: mx, y: p1.y }, p1];
}

function renderEdge(e: GraphEdge, byId: Map<string, GraphNode>): string {
  const s = byId.get(e.source);
  const t = byId.get(e.target);
  if (!s || !t) return "";
  const d = edgePoints(s, t)
    .map((p, i) => `${i === 0 ? "M" : "L"}${p.x},${p.y}`)
    .join(" ");
  return `\n    <path class="edge ${e.type}" d="${d}"/>`;
}

export function renderSvg(graph: Graph, cssPath?: string): string {
  const css = cssPath && fs.existsSync(cssPath) ? fs.readFileSync(cssPath, "utf8") : "";
  const style = css ? `\n  <style>\n${css}\n  </style>` : "";
  const b = graphBounds(graph);
  if (!b) {
    return `<svg xmlns="http://www.w3.org/2000/svg" width="0" height="0" viewBox="0 0 0 0">${style}\n</svg>\n`;
  }
  const x0 = b.x0 - PAD;
  const y0 = b.y0 - PAD;
  const w = b.x1 - b.x0 + PAD * 2;
  const h = b.y1 - b.y0 + PAD * 2;
  const byId = new Map(graph.nodes.map((n) => [n.id, n]));
  const edges = graph.edges.map((e) => renderEdge(e, byId)).join("");
  const nodes = graph.nodes.map(renderNode).join("");
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${w}" height="${h}" viewBox="${x0} ${y0} ${w} ${h}">${style}\n  <g class="edges">${edges}\n  </g>\n  <g class="nodes">${nodes}\n  </g>\n</svg>\n`;
}

function readGraph(v: unknown): Graph {
  if (typeof v === "object" && v !== null && "graph" in v) return readGraph(v.graph);
  if (typeof v === "object" && v !== null && "nodes" in v && "edges" in v && Array.isArray(v.nodes) && Array.isArray(v.edges)) {
    return { nodes: v.nodes, edges: v.edges };
  }
  throw new Error("render_svg: input has no nodes/edges");
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const cssPath = process.argv[4];
  const parsed: unknown = JSON.parse(readText(input));
  const graph = readGraph(parsed);
  writeText(output, renderSvg(graph, cssPath));
  console.error(`render_svg: nodes=${graph.nodes.length} edges=${graph.edges.length}`);
}
