import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';

export class DisabledLLMAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'DisabledLLMAdapter' });

  async generateText(_request: LLMRequest, _signal?: AbortSignal): Promise<LLMResponse> {
    this.logger.warn('LLM fallback is disabled; returning empty response');
    return { text: '' };
  }
}
