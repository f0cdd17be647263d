export type TaxonomyLabel = "Chapter" | "Heading" | "Subheading" | "Code";

export type HierarchyRelation = "HAS_HEADING" | "HAS_SUBHEADING" | "HAS_CODE";

export type EnrichmentRelation = "SIBLING_OF" | "SIMILAR_TO";

export type RelationType = HierarchyRelation | EnrichmentRelation;

export const TAXONOMY_LABELS: readonly TaxonomyLabel[] = ["Chapter", "Heading", "Subheading", "Code"];

export const HIERARCHY_RELATIONS: readonly HierarchyRelation[] = [
  "HAS_HEADING",
  "HAS_SUBHEADING",
  "HAS_CODE"
];

export const RELATION_TYPES: readonly RelationType[] = [
  ...HIERARCHY_RELATIONS,
  "SIBLING_OF",
  "SIMILAR_TO"
];

/** Deepest neighbourhood any backend returns from `getSubgraph`. */
export const MAX_SUBGRAPH_DEPTH = 5;

export function isHierarchyRelation(relation: RelationType): relation is HierarchyRelation {
  return HIERARCHY_RELATIONS.some((item) => item === relation);
}

export interface GraphNode {
  id: string;
  label: TaxonomyLabel;
  description: string;
  properties: Record<string, unknown>;
}

export interface GraphEdge {
  sourceId: string;
  targetId: string;
  relation: RelationType;
  properties: Record<string, unknown>;
}

export type NeighborDirection = "in" | "out";

export interface Subgraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  nodeTypeDistribution: Record<string, number>;
  edgeTypeDistribution: Record<string, number>;
}

export interface IntegrityViolation {
  nodeId: string;
  kind: "missing_subheading_parent" | "multiple_hierarchy_parents";
  message: string;
}

export interface IntegrityReport {
  valid: boolean;
  checkedCodes: number;
  violations: IntegrityViolation[];
}
