import { describe, it, expect } from "vitest";
import { esc, renderSvg, wrapLabel } from "../render_svg.js";
import { type Graph, type GraphNode } from "../util.js";

function node(id: string, x: number, y: number, label: string, paperCount?: number): GraphNode {
  return {
    id,
    type: "tag",
    position: { x, y },
    width: 240,
    height: 60,
    data: paperCount === undefined ? { label } : { label, paper_count: paperCount },
  };
}

describe("esc", () => {
  it("escapes markup characters", () => {
    expect(esc(`<a href="x">Tom & Jerry's</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&apos;s&lt;/a&gt;");
  });
});

describe("wrapLabel", () => {
  it("breaks on spaces", () => {
    expect(wrapLabel("AND Neuroscience")).toEqual(["AND Neuroscience"]);
    expect(wrapLabel("aaaa bbbb cc", 9)).toEqual(["aaaa bbbb", "cc"]);
  });

  it("splits words longer than a line", () => {
    expect(wrapLabel("abcdefghij k", 4)).toEqual(["abcd", "efgh", "ij k"]);
  });

  it("returns one empty line for an empty label", () => {
    expect(wrapLabel("   ")).toEqual([""]);
  });
});

describe("renderSvg", () => {
  it("renders an empty canvas for an empty graph", () => {
    expect(renderSvg({ nodes: [], edges: [] })).toBe(
      `<svg xmlns="http://www.w3.org/2000/svg" width="0" height="0" viewBox="0 0 0 0">\n</svg>\n`,
    );
  });

  it("draws nodes with counts and orthogonal edges", () => {
    const graph: Graph = {
      nodes: [node("a", 100, 50, "A & B"), node("b", 700, 150, "AND CT", 2), node("c", 700, 50, "C")],
      edges: [
        { id: "a-b", source: "a", target: "b", type: "smoothstep" },
        { id: "a-c", source: "a", target: "c", type: "smoothstep" },
        { id: "a-x", source: "a", target: "x", type: "smoothstep" },
      ],
    };
    const svg = renderSvg(graph, "/nonexistent/graph.css");
    expect(svg.split("\n")[0]).toBe(
      `<svg xmlns="http://www.w3.org/2000/svg" width="920" height="240" viewBox="-60 -20 920 240">`,
    );
    expect(svg).not.toContain("<style>");
    expect(svg).toContain(`<path class="edge smoothstep" d="M220,50 L400,50 L400,150 L580,150"/>`);
    expect(svg).toContain(`<path class="edge smoothstep" d="M220,50 L580,50"/>`);
    expect(svg.match(/<path /g)).toHaveLength(2);
    expect(svg).toContain(`<g class="node tag" id="a">`);
    expect(svg).toContain(`<rect x="-20" y="20" width="240" height="60" rx="8" ry="8"/>`);
    expect(svg).toContain(`<tspan x="100" y="50">A &amp; B</tspan>`);
    expect(svg).toContain(`<tspan x="700" y="150">AND CT (2)</tspan>`);
  });
});
