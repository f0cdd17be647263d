import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { Subgraph, TaxonomyLabel } from "@taxograph/shared";

const labelColors: Record<TaxonomyLabel, string> = {
  Chapter: "#1f77b4",
  Heading: "#ff7f0e",
  Subheading: "#2ca02c",
  Code: "#9467bd"
};

export function renderGraphMl(graph: Subgraph): string {
  const lines = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<graphml xmlns="http://graphml.graphdrawing.org/xmlns">`,
    `  <key id="label" for="node" attr.name="label" attr.type="string"/>`,
    `  <key id="description" for="node" attr.name="description" attr.type="string"/>`,
    `  <key id="relation" for="edge" attr.name="type" attr.type="string"/>`,
    `  <key id="score" for="edge" attr.name="score" attr.type="double"/>`,
    `  <graph id="taxonomy" edgedefault="directed">`
  ];

  for (const node of graph.nodes) {
    lines.push(
      `    <node id="${escapeXml(node.id)}">`,
      `      <data key="label">${escapeXml(node.label)}</data>`,
      `      <data key="description">${escapeXml(node.description)}</data>`,
      `    </node>`
    );
  }

  for (const edge of graph.edges) {
    lines.push(
      `    <edge source="${escapeXml(edge.sourceId)}" target="${escapeXml(edge.targetId)}">`,
      `      <data key="relation">${edge.relation}</data>`
    );
    const score = edge.properties.score;
    if (typeof score === "number") {
      lines.push(`      <data key="score">${score}</data>`);
    }
    lines.push(`    </edge>`);
  }

  lines.push(`  </graph>`, `</graphml>`, "");
  return lines.join("\n");
}

/**
 * Standalone page rendering the graph with vis-network; the data is inlined so the
 * file opens without a server.
 */
export function renderVisualizationHtml(graph: Subgraph): string {
  const nodes = graph.nodes.map((node) => ({
    id: node.id,
    label: node.id,
    title: `${node.label}: ${node.description}`,
    color: labelColors[node.label]
  }));
  const edges = graph.edges.map((edge) => ({
    from: edge.sourceId,
    to: edge.targetId,
    label: edge.relation,
    arrows: "to"
  }));
  const payload = JSON.stringify({ nodes, edges }).replace(/</g, "\\u003c");

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8" />
  <title>Taxonomy graph</title>
  <script src="https://unpkg.com/vis-network@9.1.9/standalone/umd/vis-network.min.js"></script>
  <style>html, body, #graph { width: 100%; height: 100%; margin: 0; }</style>
</head>
<body>
  <div id="graph"></div>
  <script>
    const data = ${payload};
    new vis.Network(document.getElementById("graph"), data, { physics: { stabilization: true } });
  </script>
</body>
</html>
`;
}

export async function writeGraphMl(filePath: string, graph: Subgraph): Promise<void> {
  await writeArtifact(filePath, renderGraphMl(graph));
}

export async function writeVisualizationHtml(filePath: string, graph: Subgraph): Promise<void> {
  await writeArtifact(filePath, renderVisualizationHtml(graph));
}

async function writeArtifact(filePath: string, content: string): Promise<void> {
  const target = resolve(filePath);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content, "utf8");
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
