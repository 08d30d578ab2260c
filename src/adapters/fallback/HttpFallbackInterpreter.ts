import type { FallbackInterpreterPort, FallbackRequest } from '../../ports/FallbackInterpreterPort.js';
import { FallbackError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

/** Remote interpreter speaking `{ text, hint_negated }` → `{ intent, device }` over JSON. */
export class HttpFallbackInterpreter implements FallbackInterpreterPort {
  readonly name = 'http';
  private readonly logger = createLogger({ adapter: 'HttpFallbackInterpreter' });

  constructor(private readonly url: string) {}

  async interpret(request: FallbackRequest, signal: AbortSignal): Promise<unknown> {
    const logger = this.logger.child({ method: 'interpret' });

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: request.text, hint_negated: request.hintNegated, locale: request.locale }),
        signal,
      });
    } catch (error) {
      throw new FallbackError('Fallback service unreachable', { cause: error });
    }

    if (!response.ok) {
      logger.error({ status: response.status }, 'Fallback service request failed');
      throw new FallbackError(`Fallback service error: ${response.status}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new FallbackError('Fallback service returned invalid JSON', { cause: error });
    }
  }
}
