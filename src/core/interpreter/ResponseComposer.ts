import type { Lexicon } from '../nlp/lexicon.js';
import type { Interpretation, Locale } from '../nlp/types.js';

/** Chooses one template out of a non-empty list. */
export type TemplatePicker = (templates: readonly string[]) => string;

export const randomPicker: TemplatePicker = (templates) =>
  templates[Math.floor(Math.random() * templates.length)] ?? '';

export const firstPicker: TemplatePicker = (templates) => templates[0] ?? '';

/** Short confirmation sentence for a speech synthesizer downstream. */
export class ResponseComposer {
  constructor(
    private readonly lexicon: Pick<Lexicon, 'responses'>,
    private readonly pick: TemplatePicker = randomPicker
  ) {}

  compose(interpretation: Pick<Interpretation, 'intent' | 'device' | 'negated'>, locale: Locale): string {
    const responses = this.lexicon.responses[locale];
    const { intent, device, negated } = interpretation;

    if (intent !== 'unknown' && intent !== 'status' && device === null && !negated) {
      return this.pick(responses.noDevice);
    }

    const templates = responses.intents[intent];
    const sentence = this.pick(negated ? templates.negated : templates.normal);
    return sentence.replace(/\{device\}/g, device ? spokenDevice(device) : spokenFallback(locale));
  }

  error(locale: Locale): string {
    return this.pick(this.lexicon.responses[locale].error);
  }
}

function spokenDevice(deviceKey: string): string {
  return deviceKey.replace(/_/g, ' ');
}

function spokenFallback(locale: Locale): string {
  return locale === 'es' ? 'el dispositivo' : 'the device';
}
