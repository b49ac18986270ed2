/**
 * Domain errors raised by the scoring service. Everything that escapes
 * ScoringService.score() is a ScoringServiceError; `code` is copied into API error bodies.
 */

export type ScoringErrorCode = "SCORING_ERROR" | "GATEWAY_ERROR" | "PARSE_ERROR" | "UNSUPPORTED_METHOD";

export class ScoringServiceError extends Error {
  readonly code: ScoringErrorCode;

  constructor(message: string, code: ScoringErrorCode = "SCORING_ERROR", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScoringServiceError";
    this.code = code;
  }
}

/** No score could be extracted from the LLM output. */
export class ParseError extends ScoringServiceError {
  constructor(message: string) {
    super(message, "PARSE_ERROR");
    this.name = "ParseError";
  }
}

/** A method outside the closed enumeration reached the orchestrator. */
export class UnsupportedMethodError extends ScoringServiceError {
  constructor(method: string) {
    super(`Unsupported scoring method: ${method}`, "UNSUPPORTED_METHOD");
    this.name = "UnsupportedMethodError";
  }
}
