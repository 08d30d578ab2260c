import type { DeviceRecord } from '../../core/nlp/types.js';
import type { FallbackInterpreterPort, FallbackRequest } from '../../ports/FallbackInterpreterPort.js';
import type { LLMPort } from '../../ports/LLMPort.js';
import { FallbackError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { fillPrompt, loadPrompt } from '../../utils/prompts.js';

export const FALLBACK_PROMPT = 'fallback_interpreter.md';

/** Current device catalogue, read at call time so reloads show up in the prompt. */
export type DeviceCatalogue = () => readonly DeviceRecord[];

/**
 * Asks a language model for `{ intent, device }` when the rules are unsure.
 * The model answer is returned as parsed JSON; shape checks happen upstream.
 */
export class LLMFallbackInterpreter implements FallbackInterpreterPort {
  readonly name = 'llm';
  private readonly logger = createLogger({ adapter: 'LLMFallbackInterpreter' });
  private template: string | undefined;

  constructor(
    private readonly llm: LLMPort,
    private readonly devices: DeviceCatalogue,
    template?: string
  ) {
    this.template = template;
  }

  async interpret(request: FallbackRequest, signal: AbortSignal): Promise<unknown> {
    const logger = this.logger.child({ method: 'interpret' });
    const template = await this.loadTemplate();
    const prompt = fillPrompt(template, {
      DEVICES: formatCatalogue(this.devices()),
      COMMAND: request.text.replace(/"/g, "'"),
      NEGATION_HINT: request.hintNegated
        ? 'the speaker phrased this as a negation'
        : 'no negation was detected',
    });

    const response = await this.llm.generateText({ prompt, maxTokens: 100, temperature: 0 }, signal);
    if (!response.text) {
      throw new FallbackError('Language model returned an empty answer');
    }

    const answer = extractJson(response.text);
    logger.debug({ answer }, 'Fallback answer parsed');
    return answer;
  }

  private async loadTemplate(): Promise<string> {
    if (this.template === undefined) {
      this.template = await loadPrompt(FALLBACK_PROMPT);
    }
    return this.template;
  }
}

export function formatCatalogue(devices: readonly DeviceRecord[]): string {
  if (devices.length === 0) {
    return '(none)';
  }
  return devices.map((device) => `${device.deviceKey}|${device.category}|${device.room ?? '-'}`).join('\n');
}

/** First `{...}` block of a model answer, parsed. */
export function extractJson(raw: string): unknown {
  const jsonMatch = raw.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new FallbackError(`No JSON object in model answer: ${raw.slice(0, 120)}`);
  }
  try {
    return JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new FallbackError('Model answer is not valid JSON', { cause: error });
  }
}
