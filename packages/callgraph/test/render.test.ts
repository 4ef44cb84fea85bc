import { describe, it, expect } from "vitest";

import type { CallEdge } from "../src/core/model.js";
import { renderD2, renderEdgeList, renderGraph, renderMermaid } from "../src/render/index.js";

const EDGES: CallEdge[] = [
  { from: "App.Handler.run/1", to: "App.Utils.format/1" },
  { from: "App.Handler.run/1", to: "App.Handler.save/1" },
  { from: "App.Handler.save/1", to: "App.Handler.save/1" },
];

describe("renderMermaid", () => {
  it("groups callees by caller inside module subgraphs", () => {
    expect(renderMermaid(EDGES)).toBe(
      [
        "flowchart LR",
        "  %% Function call graph",
        '  f1["App.Handler.run/1"]',
        "",
        '  subgraph m1["App.Handler"]',
        "  style m1 stroke-dasharray: 5 5",
        '    subgraph f1_box["run/1"]',
        '      f1_box_f2["App.Utils.format/1"]',
        '      f1_box_f3["save/1"]',
        "      f1_box_f2 --> f1_box_f3",
        "    end",
        '    subgraph f3_box["save/1"]',
        '      f3_box_f3["save/1"]',
        "    end",
        "  end",
        "",
        "  %% External connections",
        "  f1 --> m1",
        "  f1_box_f3 -.-> f3_box",
        "  f3_box_f3 --> f3_box_f3",
        "",
      ].join("\n")
    );
  });

  it("renders an empty graph", () => {
    expect(renderMermaid([])).toBe("flowchart LR\n  %% Function call graph\n\n\n  %% External connections\n");
  });
});

describe("renderD2", () => {
  it("puts functions in module containers and links modules", () => {
    expect(renderD2(EDGES)).toBe(
      [
        "direction: right",
        "# Function call graph",
        "App_Handler: App.Handler {",
        "  run_1: run/1",
        "  save_1: save/1",
        "  run_1 -> save_1",
        "  save_1 -> save_1",
        "}",
        "App_Utils: App.Utils {",
        "  format_1: format/1",
        "}",
        "",
        "# Connections",
        "App_Handler.run_1 -> App_Utils.format_1",
        "",
      ].join("\n")
    );
  });

  it("names dynamic receivers like modules", () => {
    const output = renderD2([{ from: "App.Client.post/2", to: "Dynamic.conn.request/2" }]);
    expect(output.split("\n").slice(-2)).toEqual(["App_Client.post_2 -> Dynamic_conn.request_2", ""]);
  });
});

describe("renderGraph", () => {
  it("lists edges one per line", () => {
    expect(renderEdgeList(EDGES)).toBe(
      "App.Handler.run/1 -> App.Utils.format/1\nApp.Handler.run/1 -> App.Handler.save/1\nApp.Handler.save/1 -> App.Handler.save/1"
    );
    expect(renderGraph(EDGES, "edges")).toBe(renderEdgeList(EDGES));
  });

  it("dispatches on the format", () => {
    expect(renderGraph(EDGES, "mermaid")).toBe(renderMermaid(EDGES));
    expect(renderGraph(EDGES, "d2")).toBe(renderD2(EDGES));
  });
});
