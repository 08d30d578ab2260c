import { z } from 'zod';
import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

const generateResponseSchema = z.object({
  response: z.string(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

/** Local model served by Ollama, non-streaming `/api/generate`. */
export class OllamaAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'OllamaAdapter' });
  private readonly url: string;
  private readonly model: string;

  constructor(config: Pick<Config, 'ollamaBaseUrl' | 'ollamaModel'>) {
    this.url = new URL('/api/generate', config.ollamaBaseUrl).toString();
    this.model = config.ollamaModel;
    this.logger.info({ url: this.url, model: this.model }, 'Ollama adapter initialized');
  }

  async generateText(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const logger = this.logger.child({ method: 'generateText' });

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt: request.prompt,
          system: request.systemPrompt,
          stream: false,
          format: 'json',
          options: {
            temperature: request.temperature ?? 0.1,
            num_predict: request.maxTokens ?? 100,
          },
        }),
        signal,
      });
    } catch (error) {
      logger.error({ error }, 'Ollama request failed');
      throw new LLMError('Ollama request failed', { cause: error });
    }

    if (!response.ok) {
      logger.error({ status: response.status }, 'Ollama API request failed');
      throw new LLMError(`Ollama API error: ${response.status}`);
    }

    const body: unknown = await response.json().catch((error: unknown) => {
      throw new LLMError('Ollama returned invalid JSON', { cause: error });
    });
    const parsed = generateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LLMError('Unexpected Ollama response shape', { cause: parsed.error });
    }

    const { response: text, prompt_eval_count, eval_count } = parsed.data;
    return {
      text: text.trim(),
      usage:
        prompt_eval_count !== undefined && eval_count !== undefined
          ? { inputTokens: prompt_eval_count, outputTokens: eval_count }
          : undefined,
    };
  }
}
