export class ConversationNotFoundError extends Error {
  constructor(sessionId: string) {
    super(`Conversation session does not exist: ${sessionId}`);
    this.name = "ConversationNotFoundError";
  }
}

/** Unknown backend or strategy names. Raised while wiring the runtime, never per turn. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UpstreamServiceError extends Error {
  readonly service: string;

  constructor(service: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${service} failed: ${detail}`, { cause });
    this.name = "UpstreamServiceError";
    this.service = service;
  }
}

export class CircuitOpenError extends Error {
  constructor(retryInMs: number) {
    super(`LLM circuit breaker is open; retry in ${Math.max(0, Math.ceil(retryInMs / 1000))}s`);
    this.name = "CircuitOpenError";
  }
}
