import type { Node, Relationship, Session } from "neo4j-driver";
import {
  MAX_SUBGRAPH_DEPTH,
  RELATION_TYPES,
  TAXONOMY_LABELS,
  type GraphEdge,
  type GraphNode,
  type GraphStats,
  type NeighborDirection,
  type RelationType,
  type Subgraph,
  type TaxonomyGraphStore,
  type TaxonomyLabel,
  type TraversableGraph
} from "@taxograph/shared";
import { childLogger } from "../utils/logger.js";
import { writeGraphMl } from "./graphExport.js";
import { parseJsonRecord, toNumber, toText, type Neo4jConnection } from "./neo4jSupport.js";

const log = childLogger("Neo4jGraphStore");

/**
 * Taxonomy graph persisted in Neo4j. Every node carries the shared `TaxonomyNode`
 * label plus its taxonomy label; relationship types are the relation names.
 * Labels and relation types are interpolated into Cypher only after being checked
 * against the closed sets in `@taxograph/shared`.
 */
export class Neo4jGraphStore implements TaxonomyGraphStore {
  readonly backendName = "neo4j";

  private statsCache: { data: GraphStats; expiresAt: number } | null = null;
  private static readonly STATS_TTL_MS = 30_000;

  constructor(private readonly connection: Neo4jConnection) {}

  async connect(): Promise<void> {
    await this.connection.connect();
  }

  async disconnect(): Promise<void> {
    await this.connection.disconnect();
  }

  healthCheck(): Promise<boolean> {
    return this.connection.healthCheck();
  }

  async createIndexes(): Promise<void> {
    await this.connection.withSession("WRITE", async (session) => {
      await session.run(
        `CREATE CONSTRAINT taxonomy_node_id_unique IF NOT EXISTS FOR (n:TaxonomyNode) REQUIRE n.id IS UNIQUE`
      );
      for (const label of TAXONOMY_LABELS) {
        await session.run(
          `CREATE INDEX ${label.toLowerCase()}_id_idx IF NOT EXISTS FOR (n:${label}) ON (n.id)`
        );
      }
    });
    log.info("Neo4j indexes created");
  }

  async addNode(node: GraphNode): Promise<boolean> {
    const label = assertLabel(node.label);

    const created = await this.connection.withSession("WRITE", async (session) => {
      const result = await session.run(
        `
        OPTIONAL MATCH (existing:TaxonomyNode {id: $id})
        WITH existing
        MERGE (n:TaxonomyNode {id: $id})
        ON CREATE SET
          n:${label},
          n.label = $label,
          n.description = $description,
          n.properties = $properties
        RETURN existing IS NULL AS created
        `,
        {
          id: node.id,
          label,
          description: node.description,
          properties: JSON.stringify(node.properties)
        }
      );
      return result.records[0]?.get("created") === true;
    });

    if (created) {
      this.statsCache = null;
    }
    return created;
  }

  async getNode(id: string): Promise<GraphNode | null> {
    return this.connection.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (n:TaxonomyNode {id: $id})
        RETURN n
        LIMIT 1
        `,
        { id }
      );

      const record = result.records[0];
      return record ? this.mapNode(record.get("n") as Node) : null;
    });
  }

  async listNodes(label: TaxonomyLabel): Promise<GraphNode[]> {
    const safeLabel = assertLabel(label);
    return this.connection.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (n:${safeLabel})
        RETURN n
        ORDER BY n.id ASC
        `
      );
      return result.records.map((record) => this.mapNode(record.get("n") as Node));
    });
  }

  async addEdge(edge: GraphEdge): Promise<boolean> {
    const relation = assertRelation(edge.relation);

    const created = await this.connection.withSession("WRITE", async (session) => {
      const result = await session.run(
        `
        MATCH (source:TaxonomyNode {id: $sourceId})
        MATCH (target:TaxonomyNode {id: $targetId})
        OPTIONAL MATCH (source)-[existing:${relation}]->(target)
        WITH source, target, existing
        MERGE (source)-[r:${relation}]->(target)
        ON CREATE SET r.properties = $properties, r.score = $score
        RETURN existing IS NULL AS created
        `,
        {
          sourceId: edge.sourceId,
          targetId: edge.targetId,
          properties: JSON.stringify(edge.properties),
          score: typeof edge.properties.score === "number" ? edge.properties.score : null
        }
      );
      return result.records[0]?.get("created") === true;
    });

    if (created) {
      this.statsCache = null;
    }
    return created;
  }

  async getInEdges(nodeId: string): Promise<GraphEdge[]> {
    return this.connection.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (source:TaxonomyNode)-[r]->(target:TaxonomyNode {id: $nodeId})
        RETURN r, source.id AS sourceId, target.id AS targetId
        ORDER BY elementId(r) ASC
        `,
        { nodeId }
      );
      return result.records.map((record) =>
        this.mapEdge(
          record.get("r") as Relationship,
          toText(record.get("sourceId"), ""),
          toText(record.get("targetId"), "")
        )
      );
    });
  }

  async getNeighbors(nodeId: string, direction: NeighborDirection): Promise<GraphNode[]> {
    const pattern =
      direction === "out"
        ? "(:TaxonomyNode {id: $nodeId})-[r]->(neighbor:TaxonomyNode)"
        : "(:TaxonomyNode {id: $nodeId})<-[r]-(neighbor:TaxonomyNode)";

    return this.connection.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH ${pattern}
        WITH neighbor, min(elementId(r)) AS firstEdge
        RETURN neighbor
        ORDER BY firstEdge ASC
        `,
        { nodeId }
      );
      return result.records.map((record) => this.mapNode(record.get("neighbor") as Node));
    });
  }

  async getSubgraph(nodeId: string, depth: number): Promise<Subgraph> {
    const safeDepth = Math.max(0, Math.min(Math.floor(depth), MAX_SUBGRAPH_DEPTH));

    return this.connection.withSession("READ", async (session) => {
      // Variable-length bounds cannot be parameterized, so the clamped depth is inlined.
      const nodeResult = await session.run(
        `
        MATCH (root:TaxonomyNode {id: $nodeId})
        OPTIONAL MATCH (root)-[*0..${safeDepth}]-(member:TaxonomyNode)
        WITH collect(DISTINCT member) AS members
        UNWIND members AS node
        RETURN DISTINCT node
        `,
        { nodeId }
      );

      const nodes = nodeResult.records.map((record) => this.mapNode(record.get("node") as Node));
      if (nodes.length === 0) {
        return { nodes: [], edges: [] };
      }

      const edges = await this.readEdges(
        session,
        `
        MATCH (source:TaxonomyNode)-[r]->(target:TaxonomyNode)
        WHERE source.id IN $nodeIds AND target.id IN $nodeIds
        RETURN r, source.id AS sourceId, target.id AS targetId
        `,
        { nodeIds: nodes.map((node) => node.id) }
      );

      return { nodes, edges };
    });
  }

  async exportAll(): Promise<Subgraph> {
    return this.connection.withSession("READ", async (session) => {
      const nodeResult = await session.run(`MATCH (n:TaxonomyNode) RETURN n ORDER BY n.id ASC`);
      const nodes = nodeResult.records.map((record) => this.mapNode(record.get("n") as Node));
      const edges = await this.readEdges(
        session,
        `
        MATCH (source:TaxonomyNode)-[r]->(target:TaxonomyNode)
        RETURN r, source.id AS sourceId, target.id AS targetId
        `,
        {}
      );
      return { nodes, edges };
    });
  }

  async exportGraph(filePath: string): Promise<void> {
    log.info({ filePath }, "Exporting Neo4j graph to GraphML");
    await writeGraphMl(filePath, await this.exportAll());
  }

  async getStats(): Promise<GraphStats> {
    if (this.statsCache && Date.now() < this.statsCache.expiresAt) {
      return this.statsCache.data;
    }

    const stats = await this.connection.withSession("READ", async (session) => {
      const result = await session.run(
        `
        CALL {
          MATCH (n:TaxonomyNode)
          RETURN count(n) AS nodeCount
        }
        CALL {
          MATCH (:TaxonomyNode)-[r]->(:TaxonomyNode)
          RETURN count(r) AS edgeCount
        }
        CALL {
          MATCH (n:TaxonomyNode)
          RETURN collect({name: n.label, value: 1}) AS nodeLabels
        }
        CALL {
          MATCH (:TaxonomyNode)-[r]->(:TaxonomyNode)
          RETURN collect({name: type(r), value: 1}) AS edgeTypes
        }
        RETURN nodeCount, edgeCount, nodeLabels, edgeTypes
        `
      );

      const row = result.records[0];
      return {
        nodeCount: toNumber(row?.get("nodeCount")),
        edgeCount: toNumber(row?.get("edgeCount")),
        nodeTypeDistribution: countByName(row?.get("nodeLabels")),
        edgeTypeDistribution: countByName(row?.get("edgeTypes"))
      };
    });

    this.statsCache = {
      data: stats,
      expiresAt: Date.now() + Neo4jGraphStore.STATS_TTL_MS
    };

    return stats;
  }

  asTraversable(): TraversableGraph | null {
    return null;
  }

  private async readEdges(
    session: Session,
    query: string,
    params: Record<string, unknown>
  ): Promise<GraphEdge[]> {
    const result = await session.run(query, params);
    return result.records.map((record) =>
      this.mapEdge(
        record.get("r") as Relationship,
        toText(record.get("sourceId"), ""),
        toText(record.get("targetId"), "")
      )
    );
  }

  private mapNode(node: Node): GraphNode {
    const props = node.properties as Record<string, unknown>;
    return {
      id: toText(props.id, ""),
      label: toLabel(props.label),
      description: toText(props.description, "Not specified"),
      properties: parseJsonRecord(props.properties)
    };
  }

  private mapEdge(relationship: Relationship, sourceId: string, targetId: string): GraphEdge {
    const props = relationship.properties as Record<string, unknown>;
    return {
      sourceId,
      targetId,
      relation: toRelation(relationship.type),
      properties: parseJsonRecord(props.properties)
    };
  }
}

function assertLabel(label: string): TaxonomyLabel {
  const match = TAXONOMY_LABELS.find((item) => item === label);
  if (!match) {
    throw new Error(`Unsupported taxonomy label: ${label}`);
  }
  return match;
}

function assertRelation(relation: string): RelationType {
  const match = RELATION_TYPES.find((item) => item === relation);
  if (!match) {
    throw new Error(`Unsupported relation type: ${relation}`);
  }
  return match;
}

function toLabel(value: unknown): TaxonomyLabel {
  return TAXONOMY_LABELS.find((item) => item === value) ?? "Code";
}

function toRelation(value: unknown): RelationType {
  return RELATION_TYPES.find((item) => item === value) ?? "SIMILAR_TO";
}

function countByName(items: unknown): Record<string, number> {
  const counts: Record<string, number> = {};
  if (!Array.isArray(items)) {
    return counts;
  }
  for (const item of items) {
    if (item && typeof item === "object" && "name" in item) {
      const name = toText(item.name, "");
      if (name.length > 0) {
        counts[name] = (counts[name] ?? 0) + 1;
      }
    }
  }
  return counts;
}
