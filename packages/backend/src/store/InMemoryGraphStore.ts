import {
  MAX_SUBGRAPH_DEPTH,
  type GraphEdge,
  type GraphNode,
  type GraphStats,
  type NeighborDirection,
  type Subgraph,
  type TaxonomyGraphStore,
  type TaxonomyLabel,
  type TraversableGraph
} from "@taxograph/shared";
import { childLogger } from "../utils/logger.js";
import { writeGraphMl } from "./graphExport.js";

const log = childLogger("InMemoryGraphStore");

export function edgeKey(edge: Pick<GraphEdge, "sourceId" | "targetId" | "relation">): string {
  return `${edge.sourceId}|${edge.relation}|${edge.targetId}`;
}

/**
 * Directed multigraph held in process memory. Nodes and edges live in arenas keyed
 * by stable string ids; adjacency lists hold edge keys in insertion order, which
 * keeps neighbor order deterministic for the lifetime of the process.
 */
export class InMemoryGraphStore implements TaxonomyGraphStore {
  readonly backendName = "memory";

  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();
  private readonly outEdgeKeys = new Map<string, string[]>();
  private readonly inEdgeKeys = new Map<string, string[]>();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async createIndexes(): Promise<void> {
    log.debug("In-memory backend keeps its own id indexes; nothing to create");
  }

  async addNode(node: GraphNode): Promise<boolean> {
    if (this.nodes.has(node.id)) {
      return false;
    }

    this.nodes.set(node.id, { ...node, properties: { ...node.properties } });
    this.outEdgeKeys.set(node.id, []);
    this.inEdgeKeys.set(node.id, []);
    return true;
  }

  async getNode(id: string): Promise<GraphNode | null> {
    return this.nodes.get(id) ?? null;
  }

  async listNodes(label: TaxonomyLabel): Promise<GraphNode[]> {
    return [...this.nodes.values()].filter((node) => node.label === label);
  }

  async addEdge(edge: GraphEdge): Promise<boolean> {
    if (!this.nodes.has(edge.sourceId) || !this.nodes.has(edge.targetId)) {
      log.debug(
        { sourceId: edge.sourceId, targetId: edge.targetId, relation: edge.relation },
        "Skipping edge with a missing endpoint"
      );
      return false;
    }

    const key = edgeKey(edge);
    if (this.edges.has(key)) {
      return false;
    }

    this.edges.set(key, { ...edge, properties: { ...edge.properties } });
    this.outEdgeKeys.get(edge.sourceId)?.push(key);
    this.inEdgeKeys.get(edge.targetId)?.push(key);
    return true;
  }

  async getInEdges(nodeId: string): Promise<GraphEdge[]> {
    return this.inEdgesOf(nodeId);
  }

  async getNeighbors(nodeId: string, direction: NeighborDirection): Promise<GraphNode[]> {
    const edges = direction === "in" ? this.inEdgesOf(nodeId) : this.outEdgesOf(nodeId);
    const seen = new Set<string>();
    const neighbors: GraphNode[] = [];

    for (const edge of edges) {
      const neighborId = direction === "in" ? edge.sourceId : edge.targetId;
      const neighbor = this.nodes.get(neighborId);
      if (!neighbor || seen.has(neighborId)) {
        continue;
      }
      seen.add(neighborId);
      neighbors.push(neighbor);
    }

    return neighbors;
  }

  async getSubgraph(nodeId: string, depth: number): Promise<Subgraph> {
    if (!this.nodes.has(nodeId)) {
      return { nodes: [], edges: [] };
    }

    const safeDepth = Math.max(0, Math.min(Math.floor(depth), MAX_SUBGRAPH_DEPTH));
    const visited = new Set<string>([nodeId]);
    let frontier = [nodeId];

    for (let hop = 0; hop < safeDepth && frontier.length > 0; hop += 1) {
      const next: string[] = [];
      for (const id of frontier) {
        for (const edge of this.outEdgesOf(id)) {
          if (!visited.has(edge.targetId)) {
            visited.add(edge.targetId);
            next.push(edge.targetId);
          }
        }
        for (const edge of this.inEdgesOf(id)) {
          if (!visited.has(edge.sourceId)) {
            visited.add(edge.sourceId);
            next.push(edge.sourceId);
          }
        }
      }
      frontier = next;
    }

    return this.induce(visited);
  }

  async exportAll(): Promise<Subgraph> {
    return {
      nodes: [...this.nodes.values()],
      edges: [...this.edges.values()]
    };
  }

  async exportGraph(filePath: string): Promise<void> {
    log.info({ filePath }, "Exporting graph to GraphML");
    await writeGraphMl(filePath, await this.exportAll());
  }

  async getStats(): Promise<GraphStats> {
    const nodeTypeDistribution: Record<string, number> = {};
    const edgeTypeDistribution: Record<string, number> = {};
    for (const node of this.nodes.values()) {
      nodeTypeDistribution[node.label] = (nodeTypeDistribution[node.label] ?? 0) + 1;
    }
    for (const edge of this.edges.values()) {
      edgeTypeDistribution[edge.relation] = (edgeTypeDistribution[edge.relation] ?? 0) + 1;
    }

    return {
      nodeCount: this.nodes.size,
      edgeCount: this.edges.size,
      nodeTypeDistribution,
      edgeTypeDistribution
    };
  }

  asTraversable(): TraversableGraph {
    return {
      getNode: (id) => this.nodes.get(id),
      getInEdges: (id) => this.inEdgesOf(id)
    };
  }

  private induce(nodeIds: Set<string>): Subgraph {
    const nodes: GraphNode[] = [];
    const edges: GraphEdge[] = [];
    for (const id of nodeIds) {
      const node = this.nodes.get(id);
      if (node) {
        nodes.push(node);
      }
      for (const edge of this.outEdgesOf(id)) {
        if (nodeIds.has(edge.targetId)) {
          edges.push(edge);
        }
      }
    }
    return { nodes, edges };
  }

  private outEdgesOf(nodeId: string): GraphEdge[] {
    return this.resolveEdges(this.outEdgeKeys.get(nodeId));
  }

  private inEdgesOf(nodeId: string): GraphEdge[] {
    return this.resolveEdges(this.inEdgeKeys.get(nodeId));
  }

  private resolveEdges(keys: string[] | undefined): GraphEdge[] {
    if (!keys) {
      return [];
    }
    return keys
      .map((key) => this.edges.get(key))
      .filter((edge): edge is GraphEdge => edge !== undefined);
  }
}
