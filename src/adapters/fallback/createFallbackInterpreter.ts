import type { Config } from '../../config/index.js';
import type { FallbackInterpreterPort } from '../../ports/FallbackInterpreterPort.js';
import type { LLMPort } from '../../ports/LLMPort.js';
import { ConfigError } from '../../utils/errors.js';
import { ClaudeAdapter } from '../llm/ClaudeAdapter.js';
import { DisabledLLMAdapter } from '../llm/DisabledLLMAdapter.js';
import { OllamaAdapter } from '../llm/OllamaAdapter.js';
import { HttpFallbackInterpreter } from './HttpFallbackInterpreter.js';
import { LLMFallbackInterpreter } from './LLMFallbackInterpreter.js';
import type { DeviceCatalogue } from './LLMFallbackInterpreter.js';

export type FallbackConfig = Pick<
  Config,
  'fallbackProvider' | 'anthropicApiKey' | 'llmFallbackModel' | 'ollamaBaseUrl' | 'ollamaModel' | 'fallbackUrl'
>;

/** `null` when the fallback is disabled: low-confidence commands then keep the rule guess. */
export function createFallbackInterpreter(
  config: FallbackConfig,
  devices: DeviceCatalogue
): FallbackInterpreterPort | null {
  switch (config.fallbackProvider) {
    case 'disabled':
      return null;
    case 'http':
      if (!config.fallbackUrl) {
        throw new ConfigError('FALLBACK_URL is required for the http fallback');
      }
      return new HttpFallbackInterpreter(config.fallbackUrl);
    case 'anthropic':
    case 'ollama': {
      const llm: LLMPort =
        config.fallbackProvider === 'ollama'
          ? new OllamaAdapter(config)
          : config.anthropicApiKey
            ? new ClaudeAdapter(config)
            : new DisabledLLMAdapter();
      return new LLMFallbackInterpreter(llm, devices);
    }
  }
}
