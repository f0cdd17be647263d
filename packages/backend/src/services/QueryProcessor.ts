import type {
  ClassificationResultResponse,
  DialoguePhase,
  DisambiguationOption,
  QueryIntent,
  QueryResponse,
  RetrievedDocument,
  TopMatch
} from "@taxograph/shared";
import {
  CLARIFICATION_PROMPT,
  INVALID_SELECTION_OUT_OF_RANGE,
  INVALID_SELECTION_UNPARSABLE,
  NO_RESULT_LOW_CONFIDENCE,
  buildDirectLookupSummary,
  buildDisambiguationPrompt,
  buildSelectionConfirmation
} from "../prompts/index.js";
import { childLogger } from "../utils/logger.js";
import type { ClassificationServiceLike } from "./ClassificationService.js";
import type { ConversationState } from "./ConversationState.js";

const log = childLogger("QueryProcessor");

const HSN_CODE_PATTERN = /\b(\d{8})\b/;
const BARE_INTEGER_PATTERN = /^\s*\d+\s*$/;
const SELECTION_KEYWORDS = new Set(["select", "choose", "option", "first", "second", "third"]);
const SUMMARY_KEYWORDS = new Set(["overview", "category", "type", "kind", "classification"]);
const ORDINALS: Record<string, number> = { first: 1, second: 2, third: 3 };

export type ParsedQuery =
  | { intent: "direct_lookup"; hsnCode: string }
  | { intent: Exclude<QueryIntent, "direct_lookup">; text: string };

export interface QueryProcessorOptions {
  relevanceThreshold?: number;
  disambiguationThreshold?: number;
  maxOptions?: number;
}

interface TurnOutcome {
  response: QueryResponse;
  next: DialoguePhase;
}

const IDLE: DialoguePhase = { kind: "idle" };

/** Lower-cases and folds simple plurals ("types" → "type", "categories" → "category"). */
export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z]+/g) ?? []).map((token) => {
    if (token.length > 4 && token.endsWith("ies")) {
      return `${token.slice(0, -3)}y`;
    }
    if (token.length > 3 && token.endsWith("s") && !token.endsWith("ss")) {
      return token.slice(0, -1);
    }
    return token;
  });
}

export function classifyIntent(query: string, phase: DialoguePhase): ParsedQuery {
  const code = query.match(HSN_CODE_PATTERN)?.[1];
  if (code) {
    return { intent: "direct_lookup", hsnCode: code };
  }

  const tokens = tokenize(query);
  if (
    phase.kind === "awaiting_selection" &&
    (BARE_INTEGER_PATTERN.test(query) || tokens.some((token) => SELECTION_KEYWORDS.has(token)))
  ) {
    return { intent: "selection", text: query };
  }

  if (tokens.some((token) => SUMMARY_KEYWORDS.has(token))) {
    return { intent: "summarization", text: query };
  }

  return { intent: "classification", text: query };
}

/**
 * First integer in the text, else the first ordinal word ("second" → 2); null when
 * neither is present.
 */
export function parseSelection(text: string): number | null {
  const digits = text.match(/\d+/)?.[0];
  if (digits !== undefined) {
    return Number.parseInt(digits, 10);
  }
  for (const token of tokenize(text)) {
    const ordinal = ORDINALS[token];
    if (ordinal !== undefined) {
      return ordinal;
    }
  }
  return null;
}

export interface QueryProcessorLike {
  processQuery(query: string, state: ConversationState): Promise<QueryResponse>;
}

/**
 * Dialogue engine for one query turn. The response is fully built before the state
 * is touched, so a collaborator failure leaves the conversation exactly as it was.
 */
export class QueryProcessor implements QueryProcessorLike {
  private readonly relevanceThreshold: number;
  private readonly disambiguationThreshold: number;
  private readonly maxOptions: number;

  constructor(
    private readonly classifier: ClassificationServiceLike,
    options: QueryProcessorOptions = {}
  ) {
    this.relevanceThreshold = options.relevanceThreshold ?? 0.4;
    this.disambiguationThreshold = options.disambiguationThreshold ?? 0.15;
    this.maxOptions = options.maxOptions ?? 3;
  }

  async processQuery(query: string, state: ConversationState): Promise<QueryResponse> {
    const parsed = classifyIntent(query, state.phase);
    log.debug({ sessionId: state.sessionId, intent: parsed.intent }, "Query parsed");

    const outcome = await this.handle(parsed, query, state);
    state.commitTurn(query, outcome.response, outcome.next);
    log.info(
      { sessionId: state.sessionId, intent: parsed.intent, response: outcome.response.type, phase: outcome.next.kind },
      "Turn processed"
    );
    return outcome.response;
  }

  private async handle(parsed: ParsedQuery, query: string, state: ConversationState): Promise<TurnOutcome> {
    switch (parsed.intent) {
      case "direct_lookup":
        return { response: await this.handleDirectLookup(parsed.hsnCode), next: IDLE };
      case "selection":
        return this.handleSelection(parsed.text, state);
      case "summarization":
        return { response: { type: "clarification_prompt", summary: CLARIFICATION_PROMPT }, next: IDLE };
      case "classification":
        return this.handleClassification(query);
    }
  }

  private async handleDirectLookup(hsnCode: string): Promise<QueryResponse> {
    const document = await this.classifier.lookupDocument(hsnCode);
    if (!document) {
      return {
        type: "no_result",
        reason: "not_found",
        summary: `HSN Code ${hsnCode} was not found in our database.`
      };
    }

    return {
      type: "classification_result",
      summary: buildDirectLookupSummary(hsnCode, document.metadata),
      topMatches: [
        {
          hsnCode,
          description: document.metadata.itemDescription,
          metadata: document.metadata
        }
      ]
    };
  }

  private handleSelection(text: string, state: ConversationState): TurnOutcome {
    const options = state.pendingOptions() ?? [];
    const selection = parseSelection(text);

    if (selection === null) {
      return { response: { type: "invalid_selection", summary: INVALID_SELECTION_UNPARSABLE }, next: state.phase };
    }

    const chosen = selection >= 1 ? options[selection - 1] : undefined;
    if (!chosen) {
      return { response: { type: "invalid_selection", summary: INVALID_SELECTION_OUT_OF_RANGE }, next: state.phase };
    }

    const response: ClassificationResultResponse = {
      type: "classification_result",
      summary: buildSelectionConfirmation(chosen.metadata.hsnCode),
      topMatches: [toTopMatch(chosen)],
      confidence: "Very High (User Confirmed)"
    };
    return { response, next: IDLE };
  }

  private async handleClassification(query: string): Promise<TurnOutcome> {
    const documents = await this.classifier.retrieveDocuments(query);
    const topScore = documents[0]?.score ?? 0;

    if (topScore < this.relevanceThreshold) {
      return {
        response: {
          type: "no_result",
          reason: "low_confidence",
          summary: NO_RESULT_LOW_CONFIDENCE,
          confidence: "Very Low"
        },
        next: IDLE
      };
    }

    const options = this.findAmbiguousOptions(documents);
    if (options) {
      return {
        response: { type: "disambiguation", summary: buildDisambiguationPrompt(options), options },
        next: { kind: "awaiting_selection", options }
      };
    }

    return { response: await this.classifier.generateFromDocs(query, documents), next: IDLE };
  }

  /** Top candidates to offer when the first two scores are within the threshold. */
  findAmbiguousOptions(documents: RetrievedDocument[]): DisambiguationOption[] | null {
    const [first, second] = documents;
    if (!first || !second) {
      return null;
    }

    const gap = first.score - second.score;
    log.debug({ first: first.score, second: second.score, gap }, "Ambiguity check");
    if (gap >= this.disambiguationThreshold) {
      return null;
    }

    return documents
      .slice(0, this.maxOptions)
      .map((doc) => ({ ...doc, metadata: { ...doc.metadata } }));
  }
}

function toTopMatch(option: DisambiguationOption): TopMatch {
  const match: TopMatch = {
    hsnCode: option.metadata.hsnCode,
    description: option.metadata.itemDescription,
    retrievalScore: option.score,
    metadata: option.metadata
  };
  if (option.graphContext !== undefined) {
    match.graphContext = option.graphContext;
  }
  return match;
}
