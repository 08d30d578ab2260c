import { z } from 'zod';
import type { FallbackInterpreterPort } from '../../ports/FallbackInterpreterPort.js';
import { FallbackError, describeError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import type { EntityResolver } from '../nlp/EntityResolver.js';
import type { IntentClassifier } from '../nlp/IntentClassifier.js';
import type { NegationDetector } from '../nlp/NegationDetector.js';
import type { Normalizer } from '../nlp/Normalizer.js';
import { parseVocabulary } from '../nlp/VocabularySnapshot.js';
import type { VocabularySnapshot } from '../nlp/VocabularySnapshot.js';
import { DEFAULT_TUNING, isIntentKind } from '../nlp/types.js';
import type {
  DeviceMatch,
  DeviceRecord,
  IntentKind,
  IntentMatch,
  Interpretation,
  InterpretationSource,
  InterpreterTuning,
  Locale,
  NegationResult,
} from '../nlp/types.js';

export interface RuleAnalysis {
  normalizedText: string;
  /** Normalized text with the negation span removed. */
  cleanText: string;
  negation: NegationResult;
  intent: IntentMatch;
  device: DeviceMatch;
}

export interface InterpretOptions {
  locale?: Locale;
  /** Aborts only the fallback wait; rule stages are synchronous. */
  signal?: AbortSignal;
  logger?: Logger;
}

export type ReloadOutcome = { ok: true; deviceCount: number } | { ok: false; error: string };

export interface OrchestratorDeps {
  normalizer: Normalizer;
  negation: NegationDetector;
  classifier: IntentClassifier;
  resolver: EntityResolver;
  fallback: FallbackInterpreterPort | null;
  tuning?: Pick<InterpreterTuning, 'intentThreshold' | 'deviceThreshold' | 'deviceOptionalIntents'>;
  fallbackTimeoutMs?: number;
  defaultLocale?: Locale;
}

const fallbackAnswerSchema = z.object({
  intent: z.string().transform((intent) => intent.trim().toLowerCase()),
  device: z
    .string()
    .nullish()
    .transform((device) => (device?.trim() ? device.trim() : null)),
});

/**
 * Runs the rule pipeline and decides, through a confidence gate, whether the
 * rule result stands or the fallback interpreter is consulted. Never throws
 * for bad input or fallback trouble; those end in a rule-based answer with a
 * note.
 */
export class InterpretationOrchestrator {
  private readonly logger = createLogger({ component: 'orchestrator' });
  private readonly tuning: Pick<InterpreterTuning, 'intentThreshold' | 'deviceThreshold' | 'deviceOptionalIntents'>;
  private readonly fallbackTimeoutMs: number;
  private readonly defaultLocale: Locale;

  constructor(private readonly deps: OrchestratorDeps) {
    this.tuning = deps.tuning ?? DEFAULT_TUNING;
    this.fallbackTimeoutMs = deps.fallbackTimeoutMs ?? 8000;
    this.defaultLocale = deps.defaultLocale ?? 'es';
  }

  get fallbackName(): string | null {
    return this.deps.fallback?.name ?? null;
  }

  devices(): readonly DeviceRecord[] {
    return this.deps.resolver.snapshot().devices;
  }

  device(deviceKey: string): DeviceRecord | undefined {
    return this.deps.resolver.snapshot().device(deviceKey);
  }

  /** Rule stages only. Synchronous and pure over the given snapshot. */
  analyze(text: string, snapshot: VocabularySnapshot = this.deps.resolver.snapshot()): RuleAnalysis {
    const { normalizer, negation: detector, classifier, resolver } = this.deps;
    const normalizedText = normalizer.normalize(text);
    const negation = detector.detect(normalizedText);
    const cleanText = detector.removeNegation(normalizedText, negation);
    return {
      normalizedText,
      cleanText,
      negation,
      intent: classifier.match(cleanText),
      device: resolver.match(cleanText, snapshot),
    };
  }

  passesGate(analysis: Pick<RuleAnalysis, 'intent' | 'device'>): boolean {
    const { intentThreshold, deviceThreshold, deviceOptionalIntents } = this.tuning;
    if (analysis.intent.intent === 'unknown' || analysis.intent.confidence < intentThreshold) {
      return false;
    }
    return analysis.device.confidence >= deviceThreshold || deviceOptionalIntents.includes(analysis.intent.intent);
  }

  async interpret(text: string, options: InterpretOptions = {}): Promise<Interpretation> {
    const logger = options.logger ?? this.logger;
    const snapshot = this.deps.resolver.snapshot();
    const analysis = this.analyze(text, snapshot);
    const negated = analysis.negation.isNegated;

    if (!analysis.normalizedText) {
      return result('unknown', null, false, 'rules', null);
    }

    const passed = this.passesGate(analysis);
    logger.debug(
      {
        state: 'rule_attempt',
        intent: analysis.intent.intent,
        intentConfidence: analysis.intent.confidence,
        ruleId: analysis.intent.ruleId,
        device: analysis.device.deviceKey,
        deviceConfidence: analysis.device.confidence,
        strategy: analysis.device.strategy,
        negation: analysis.negation.isNegated ? analysis.negation.type : null,
        passed,
      },
      'Gate decision'
    );

    if (passed) {
      return result(analysis.intent.intent, analysis.device.deviceKey, negated, 'rules', null);
    }

    const { fallback } = this.deps;
    if (!fallback) {
      return this.ruleGuess(analysis, 'low rule confidence; no fallback interpreter configured');
    }

    logger.debug({ state: 'fallback_delegated', fallback: fallback.name }, 'Delegating to fallback');
    const timeout = AbortSignal.timeout(this.fallbackTimeoutMs);
    const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;

    try {
      const raw = await abortable(
        (innerSignal) =>
          fallback.interpret(
            { text, hintNegated: negated, locale: options.locale ?? this.defaultLocale },
            innerSignal
          ),
        signal
      );
      const answer = fallbackAnswerSchema.safeParse(raw);
      if (!answer.success) {
        throw new FallbackError('malformed fallback answer', { cause: answer.error });
      }
      const { intent, device } = answer.data;
      if (!isIntentKind(intent)) {
        throw new FallbackError(`fallback answered unsupported intent "${intent}"`);
      }
      return result(intent, device, negated, 'fallback', this.fallbackNote(intent, device));
    } catch (error) {
      const reason = timeout.aborted
        ? `timed out after ${this.fallbackTimeoutMs}ms`
        : options.signal?.aborted
          ? 'request aborted'
          : describeError(error);
      logger.warn({ fallback: fallback.name, reason, error }, 'Fallback interpreter failed; using rule guess');
      return this.ruleGuess(analysis, `low rule confidence; fallback ${fallback.name} failed (${reason})`);
    }
  }

  reloadVocabulary(raw: unknown): ReloadOutcome {
    try {
      const records = parseVocabulary(raw);
      const snapshot = this.deps.resolver.reload(records);
      return { ok: true, deviceCount: snapshot.size };
    } catch (error) {
      this.logger.warn({ error }, 'Vocabulary reload rejected; keeping previous snapshot');
      return { ok: false, error: describeError(error) };
    }
  }

  private ruleGuess(analysis: RuleAnalysis, note: string): Interpretation {
    return result(
      analysis.intent.intent,
      analysis.device.deviceKey,
      analysis.negation.isNegated,
      'rules',
      note
    );
  }

  private fallbackNote(intent: IntentKind, device: string | null): string | null {
    if (intent === 'unknown') {
      return 'intent not recognized';
    }
    if (device === null && !this.tuning.deviceOptionalIntents.includes(intent)) {
      return 'device not identified';
    }
    return null;
  }
}

function result(
  intent: IntentKind,
  device: string | null,
  negated: boolean,
  source: InterpretationSource,
  note: string | null
): Interpretation {
  return Object.freeze({ intent, device, negated, source, note });
}

/** Settles with `work`, or rejects as soon as `signal` aborts even if `work` ignores it. */
export function abortable<T>(work: (signal: AbortSignal) => Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void Promise.resolve()
      .then(() => work(signal))
      .then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
  });
}
