import type { Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { InterpretationOrchestrator } from '../../core/interpreter/InterpretationOrchestrator.js';
import type { ResponseComposer } from '../../core/interpreter/ResponseComposer.js';
import { toWireDevice } from '../../core/nlp/VocabularySnapshot.js';
import { isLocale } from '../../core/nlp/types.js';
import type { Locale } from '../../core/nlp/types.js';
import type { VocabularyRefreshJob } from '../../scheduler/VocabularyRefreshJob.js';
import { createLogger, createRequestLogger } from '../../utils/logger.js';

// Parsed apart so an unusable locale never costs the command text.
const textFieldSchema = z.object({ text: z.string() });
const localeFieldSchema = z.object({ locale: z.string() });

export interface InterpretRouterDeps {
  orchestrator: InterpretationOrchestrator;
  composer: ResponseComposer;
  refreshJob: VocabularyRefreshJob;
  locales: readonly Locale[];
  defaultLocale: Locale;
}

export function createInterpretRouter(deps: InterpretRouterDeps): Router {
  const logger = createLogger({ component: 'interpretRouter' });
  const router = express.Router();

  // Raw text so an unparseable body reaches the handler instead of the error middleware.
  router.post('/interpret', express.text({ type: () => true, limit: '16kb' }), async (req, res) => {
    const requestLogger = createRequestLogger(logger);
    const body = parseJsonBody(req.body);
    const textField = textFieldSchema.safeParse(body);
    if (!textField.success) {
      requestLogger.info('Interpret body has no text; treating as empty text');
    }
    const text = textField.success ? textField.data.text : '';
    const localeField = localeFieldSchema.safeParse(body);
    const locale = localeField.success ? pickLocale(localeField.data.locale, deps) : deps.defaultLocale;

    // Client went away: stop waiting for the fallback, the answer has no reader.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const interpretation = await deps.orchestrator.interpret(text, {
        locale,
        signal: controller.signal,
        logger: requestLogger,
      });
      requestLogger.info({ text, ...interpretation }, 'Command interpreted');

      res.status(200).json({
        success: interpretation.intent !== 'unknown',
        data: {
          intent: interpretation.intent,
          device: interpretation.device,
          negated: interpretation.negated,
        },
        source: interpretation.source,
        originalText: text,
        confidenceNote: interpretation.note,
        responseText: deps.composer.compose(interpretation, locale),
      });
    } catch (error) {
      requestLogger.error({ error }, 'Error interpreting command');
      res.status(500).json({ success: false, error: deps.composer.error(locale) });
    }
  });

  router.get('/devices', (_req, res) => {
    const devices = deps.orchestrator.devices();
    res.status(200).json({ count: devices.length, devices: devices.map(toWireDevice) });
  });

  router.get('/devices/:deviceKey', (req, res) => {
    const device = deps.orchestrator.device(req.params.deviceKey);
    if (!device) {
      res.status(404).json({ error: `Device ${req.params.deviceKey} not found` });
      return;
    }
    res.status(200).json(toWireDevice(device));
  });

  router.post('/devices/reload', async (_req, res) => {
    const outcome = await deps.refreshJob.run();
    if (outcome.ok) {
      res.status(200).json(outcome);
    } else {
      res.status(409).json(outcome);
    }
  });

  return router;
}

function pickLocale(requested: string, deps: Pick<InterpretRouterDeps, 'locales' | 'defaultLocale'>): Locale {
  const candidate = requested.trim().toLowerCase();
  return isLocale(candidate) && deps.locales.includes(candidate) ? candidate : deps.defaultLocale;
}

function parseJsonBody(body: unknown): unknown {
  if (typeof body !== 'string' || !body.trim()) {
    return undefined;
  }
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}
