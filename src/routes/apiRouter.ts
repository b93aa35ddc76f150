import type { Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { IntentClassifier } from '../core/intent/IntentClassifier.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export const voiceIntentRequestSchema = z.object({
  message: z.string(),
  context: z.array(z.string()).nullish(),
});

export function createApiRouter(classifier: IntentClassifier): Router {
  const logger = createLogger({ component: 'apiRouter' });
  const router = express.Router();

  router.get('/hello', (_req, res) => {
    res.status(200).json({ message: 'Hello from the backend API!' });
  });

  router.post('/voice-intent', (req, res) => {
    const parsed = voiceIntentRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid request body',
        parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }

    const result = classifier.classify(parsed.data);
    logger.debug({ intent: result.intent }, 'Classified message');
    res.status(200).json(result);
  });

  return router;
}
