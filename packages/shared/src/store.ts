import type {
  GraphEdge,
  GraphNode,
  GraphStats,
  NeighborDirection,
  Subgraph,
  TaxonomyLabel
} from "./types/graph.js";
import type { RetrievedDocument, TaxonomyDocument } from "./types/taxonomy.js";

/**
 * Synchronous view over a graph held in process memory. Only backends that can
 * answer traversal questions without I/O expose one.
 */
export interface TraversableGraph {
  getNode(id: string): GraphNode | undefined;
  getInEdges(id: string): GraphEdge[];
}

export interface GraphNodeStore {
  addNode(node: GraphNode): Promise<boolean>;
  getNode(id: string): Promise<GraphNode | null>;
  listNodes(label: TaxonomyLabel): Promise<GraphNode[]>;
}

export interface GraphEdgeStore {
  addEdge(edge: GraphEdge): Promise<boolean>;
  getInEdges(nodeId: string): Promise<GraphEdge[]>;
}

export interface GraphQueryStore {
  getNeighbors(nodeId: string, direction: NeighborDirection): Promise<GraphNode[]>;
  getSubgraph(nodeId: string, depth: number): Promise<Subgraph>;
  exportAll(): Promise<Subgraph>;
}

export interface TaxonomyGraphStore extends GraphNodeStore, GraphEdgeStore, GraphQueryStore {
  readonly backendName: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
  createIndexes(): Promise<void>;
  getStats(): Promise<GraphStats>;
  exportGraph(filePath: string): Promise<void>;
  asTraversable(): TraversableGraph | null;
}

export interface VectorStore {
  readonly backendName: string;
  initialize(documents: TaxonomyDocument[]): Promise<void>;
  query(text: string, topK: number): Promise<RetrievedDocument[]>;
  getDocument(id: string): Promise<TaxonomyDocument | null>;
  healthCheck(): Promise<boolean>;
}
