export interface FallbackRequest {
  /** Original utterance, before normalization. */
  text: string;
  /** Negation seen by the rule stage; a hint only. */
  hintNegated: boolean;
  locale: string;
}

/**
 * Second-opinion interpreter consulted when rule confidence is too low.
 * Resolves to the collaborator's raw answer, expected to look like
 * `{ intent, device }`; the orchestrator validates it.
 */
export interface FallbackInterpreterPort {
  readonly name: string;
  interpret(request: FallbackRequest, signal: AbortSignal): Promise<unknown>;
}
