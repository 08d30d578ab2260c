import Anthropic from '@anthropic-ai/sdk';
import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

/** Build system param with prompt caching; the catalogue prompt repeats on every fallback call. */
function buildSystemParam(
  systemPrompt: string | undefined
): Array<{ type: 'text'; text: string; cache_control: { type: 'ephemeral' } }> | undefined {
  if (!systemPrompt?.trim()) {
    return undefined;
  }
  return [
    {
      type: 'text',
      text: systemPrompt,
      cache_control: { type: 'ephemeral' },
    },
  ];
}

export class ClaudeAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(config: Pick<Config, 'anthropicApiKey' | 'llmFallbackModel'>, client?: Anthropic) {
    this.client = client ?? new Anthropic({ apiKey: config.anthropicApiKey });
    this.model = config.llmFallbackModel ?? 'claude-3-5-haiku-latest';
    this.logger.info({ model: this.model }, 'Claude adapter initialized');
  }

  async generateText(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const logger = this.logger.child({ method: 'generateText' });
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens ?? 200,
          temperature: request.temperature ?? 0,
          system: buildSystemParam(request.systemPrompt),
          messages: [
            {
              role: 'user',
              content: request.prompt,
            },
          ],
        },
        { signal }
      );

      return buildLlmResponse(response);
    } catch (error) {
      logger.error({ error }, 'Claude text generation failed');
      throw new LLMError('Claude text generation failed', { cause: error });
    }
  }
}

function buildLlmResponse(response: Anthropic.Message): LLMResponse {
  const text = response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('')
    .trim();
  return {
    text,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
  };
}
