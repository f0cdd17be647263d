import type { RetrievedDocument, TaxonomyDocumentMetadata } from "./taxonomy.js";

export type QueryIntent = "direct_lookup" | "selection" | "summarization" | "classification";

export type ConfidenceLevel = "Medium" | "High" | "Very Low" | "Very High (User Confirmed)";

export type DisambiguationOption = RetrievedDocument;

export interface TopMatch {
  hsnCode: string;
  description: string;
  retrievalScore?: number;
  graphContext?: string;
  metadata: TaxonomyDocumentMetadata;
}

export interface ClassificationResultResponse {
  type: "classification_result";
  summary: string;
  topMatches: TopMatch[];
  confidence?: ConfidenceLevel;
}

export interface DisambiguationResponse {
  type: "disambiguation";
  summary: string;
  options: DisambiguationOption[];
}

export interface ClarificationPromptResponse {
  type: "clarification_prompt";
  summary: string;
}

export interface NoResultResponse {
  type: "no_result";
  reason: "not_found" | "low_confidence";
  summary: string;
  confidence?: ConfidenceLevel;
}

export interface InvalidSelectionResponse {
  type: "invalid_selection";
  summary: string;
}

export type QueryResponse =
  | ClassificationResultResponse
  | DisambiguationResponse
  | ClarificationPromptResponse
  | NoResultResponse
  | InvalidSelectionResponse;

export interface ConversationTurn {
  query: string;
  response: QueryResponse;
  createdAt: Date;
}

export type DialoguePhase =
  | { kind: "idle" }
  | { kind: "awaiting_selection"; options: DisambiguationOption[] };

export interface UserPreferences {
  expertiseLevel: "novice" | "expert";
}

export interface ConversationSnapshot {
  sessionId: string;
  phase: DialoguePhase["kind"];
  turns: ConversationTurn[];
  userPreferences: UserPreferences;
  createdAt: Date;
  updatedAt: Date;
}
