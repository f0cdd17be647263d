import type { ConversationSnapshot, QueryResponse } from "./conversation.js";
import type { GraphNode, GraphStats, IntegrityReport, Subgraph } from "./graph.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export interface CreateSessionResponse {
  session: ConversationSnapshot;
}

export interface ListSessionsResponse {
  sessions: ConversationSnapshot[];
}

export interface SessionDetailResponse {
  session: ConversationSnapshot;
  history: string;
}

export interface SubmitQueryResponse {
  sessionId: string;
  response: QueryResponse;
  phase: ConversationSnapshot["phase"];
}

export type GraphStatsResponse = GraphStats;

export type GraphIntegrityResponse = IntegrityReport;

export interface GraphNodeResponse {
  node: GraphNode;
}

export interface GraphNeighborsResponse {
  nodes: GraphNode[];
}

export type GraphSubgraphResponse = Subgraph;

export type ServiceCheckStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec: number;
  checks: {
    graphStore: ServiceCheckStatus;
    vectorStore: ServiceCheckStatus;
    llm: ServiceCheckStatus;
  };
  memoryUsage: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
