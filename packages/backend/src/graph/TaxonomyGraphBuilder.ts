import {
  isHierarchyRelation,
  type GraphEdge,
  type GraphNode,
  type GraphStats,
  type IntegrityReport,
  type IntegrityViolation,
  type Subgraph,
  type TaxonomyGraphStore,
  type TaxonomyRecord
} from "@taxograph/shared";
import type { EmbeddingProvider } from "../services/llmTypes.js";
import { writeVisualizationHtml } from "../store/graphExport.js";
import { childLogger } from "../utils/logger.js";
import { cosineSimilarity } from "../vector/similarity.js";

const log = childLogger("TaxonomyGraphBuilder");

export type HierarchyDirection = "up" | "down";

export interface BuildReport {
  recordsProcessed: number;
  nodesCreated: number;
  edgesCreated: number;
}

export const chapterNodeId = (chapter: string) => `chap_${chapter}`;
export const headingNodeId = (heading: string) => `head_${heading}`;
export const subheadingNodeId = (subheading: string) => `sub_${subheading}`;
export const codeNodeId = (hsnCode: string) => `code_${hsnCode}`;

/**
 * Writes the commodity hierarchy into a graph store and layers enrichment edges on
 * top of it. Every write goes through the store's idempotent inserts, so a build can
 * be repeated over the same records without changing the graph.
 */
export class TaxonomyGraphBuilder {
  constructor(private readonly store: TaxonomyGraphStore) {}

  async build(records: TaxonomyRecord[]): Promise<BuildReport> {
    const report: BuildReport = { recordsProcessed: 0, nodesCreated: 0, edgesCreated: 0 };

    for (const record of records) {
      const chapterId = chapterNodeId(record.chapter);
      const headingId = headingNodeId(record.heading);
      const subheadingId = subheadingNodeId(record.subheading);
      const codeId = codeNodeId(record.hsnCode);

      const nodes: GraphNode[] = [
        node(chapterId, "Chapter", record.chapterDescription, { code: record.chapter }),
        node(headingId, "Heading", record.headingDescription, { code: record.heading }),
        node(subheadingId, "Subheading", record.subheadingDescription, { code: record.subheading }),
        node(codeId, "Code", record.itemDescription, { hsnCode: record.hsnCode })
      ];
      const edges: GraphEdge[] = [
        edge(chapterId, headingId, "HAS_HEADING"),
        edge(headingId, subheadingId, "HAS_SUBHEADING"),
        edge(subheadingId, codeId, "HAS_CODE")
      ];

      for (const item of nodes) {
        if (await this.store.addNode(item)) {
          report.nodesCreated += 1;
        }
      }
      for (const item of edges) {
        if (await this.store.addEdge(item)) {
          report.edgesCreated += 1;
        }
      }
      report.recordsProcessed += 1;
    }

    log.info(report, "Hierarchical graph construction complete");
    return report;
  }

  /** Adds SIBLING_OF both ways between every pair of codes under one subheading. */
  async enrichSiblings(): Promise<number> {
    let created = 0;

    for (const subheading of await this.store.listNodes("Subheading")) {
      const children = (await this.store.getNeighbors(subheading.id, "out")).filter(
        (child) => child.label === "Code"
      );

      for (let i = 0; i < children.length; i += 1) {
        for (let j = i + 1; j < children.length; j += 1) {
          const left = children[i];
          const right = children[j];
          if (!left || !right) {
            continue;
          }
          if (await this.store.addEdge(edge(left.id, right.id, "SIBLING_OF"))) {
            created += 1;
          }
          if (await this.store.addEdge(edge(right.id, left.id, "SIBLING_OF"))) {
            created += 1;
          }
        }
      }
    }

    log.info({ created }, "Added SIBLING_OF relationships");
    return created;
  }

  /**
   * Pairwise cosine pass over every code description. A SIMILAR_TO edge from the
   * earlier to the later code is added for each pair scoring strictly above
   * `threshold`. Quadratic in the number of codes.
   */
  async enrichSimilarity(embeddings: EmbeddingProvider, threshold: number): Promise<number> {
    const codes = await this.store.listNodes("Code");
    if (codes.length < 2) {
      log.warn({ count: codes.length }, "Not enough code nodes for similarity enrichment");
      return 0;
    }

    log.info({ count: codes.length }, "Generating embeddings for code descriptions");
    const vectors = await embeddings.generateEmbeddings(codes.map((code) => code.description));
    if (vectors.length !== codes.length) {
      throw new Error(`Embedding count mismatch: expected ${codes.length}, received ${vectors.length}`);
    }

    let created = 0;
    for (let i = 0; i < codes.length; i += 1) {
      for (let j = i + 1; j < codes.length; j += 1) {
        const left = codes[i];
        const right = codes[j];
        const score = cosineSimilarity(vectors[i] ?? [], vectors[j] ?? []);
        if (!left || !right || score <= threshold) {
          continue;
        }
        log.debug({ source: left.id, target: right.id, score }, "Similar codes");
        if (await this.store.addEdge(edge(left.id, right.id, "SIMILAR_TO", { score }))) {
          created += 1;
        }
      }
    }

    log.info({ created, threshold }, "Added SIMILAR_TO relationships");
    return created;
  }

  async optimize(): Promise<void> {
    await this.store.createIndexes();
  }

  /**
   * Checks that every code hangs off a subheading and has a single hierarchy parent.
   * Violations are logged and reported, never thrown.
   */
  async validateIntegrity(): Promise<IntegrityReport> {
    const codes = await this.store.listNodes("Code");
    const violations: IntegrityViolation[] = [];

    for (const code of codes) {
      const parents = await this.store.getNeighbors(code.id, "in");
      if (!parents.some((parent) => parent.label === "Subheading")) {
        violations.push({
          nodeId: code.id,
          kind: "missing_subheading_parent",
          message: `Node ${code.id} has no Subheading parent`
        });
      }

      const hierarchyEdges = (await this.store.getInEdges(code.id)).filter((item) =>
        isHierarchyRelation(item.relation)
      );
      if (hierarchyEdges.length > 1) {
        violations.push({
          nodeId: code.id,
          kind: "multiple_hierarchy_parents",
          message: `Node ${code.id} has ${hierarchyEdges.length} hierarchy parents: ${hierarchyEdges
            .map((item) => item.sourceId)
            .join(", ")}`
        });
      }
    }

    for (const violation of violations) {
      log.warn({ nodeId: violation.nodeId, kind: violation.kind }, violation.message);
    }
    if (violations.length === 0) {
      log.info({ checkedCodes: codes.length }, "Graph integrity validation passed");
    }

    return { valid: violations.length === 0, checkedCodes: codes.length, violations };
  }

  getStatistics(): Promise<GraphStats> {
    return this.store.getStats();
  }

  exportGraph(filePath: string): Promise<void> {
    return this.store.exportGraph(filePath);
  }

  /** Writes an HTML view of the graph; only backends with direct traversal support it. */
  async writeVisualization(filePath: string): Promise<boolean> {
    if (!this.store.asTraversable()) {
      log.warn({ backend: this.store.backendName }, "Visualization is not supported for this backend");
      return false;
    }

    await writeVisualizationHtml(filePath, await this.store.exportAll());
    log.info({ filePath }, "Visualization saved");
    return true;
  }

  /** One hop along hierarchy relations only; enrichment edges are never followed. */
  async traverseHierarchy(hsnCode: string, direction: HierarchyDirection = "up"): Promise<GraphNode[]> {
    const codeId = codeNodeId(hsnCode);

    if (direction === "up") {
      const parentEdges = (await this.store.getInEdges(codeId)).filter((item) =>
        isHierarchyRelation(item.relation)
      );
      const parents = await Promise.all(parentEdges.map((item) => this.store.getNode(item.sourceId)));
      return parents.filter((parent): parent is GraphNode => parent !== null);
    }

    const { nodes, edges } = await this.store.getSubgraph(codeId, 1);
    const childIds = new Set(
      edges
        .filter((item) => item.sourceId === codeId && isHierarchyRelation(item.relation))
        .map((item) => item.targetId)
    );
    return nodes.filter((item) => childIds.has(item.id));
  }

  getContextSubgraph(hsnCode: string, depth = 1): Promise<Subgraph> {
    return this.store.getSubgraph(codeNodeId(hsnCode), depth);
  }
}

function node(
  id: string,
  label: GraphNode["label"],
  description: string,
  properties: Record<string, unknown>
): GraphNode {
  return { id, label, description: description || "Not specified", properties };
}

function edge(
  sourceId: string,
  targetId: string,
  relation: GraphEdge["relation"],
  properties: Record<string, unknown> = {}
): GraphEdge {
  return { sourceId, targetId, relation, properties };
}
