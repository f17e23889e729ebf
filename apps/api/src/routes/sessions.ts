import { randomUUID } from 'node:crypto';
import { Router } from 'express';
import { z } from 'zod';
import { enrichmentKindSchema } from '../workers/contracts.js';
import type { Services } from '../app.js';

const textSchema = z.string().trim().min(1).max(4000);

const newSessionBodySchema = z.object({
  text: textSchema,
  enrichments: z.array(enrichmentKindSchema).optional()
});

const messageBodySchema = newSessionBodySchema.extend({
  refine: z
    .object({
      enrichments: z.array(enrichmentKindSchema).optional(),
      indices: z.array(z.number().int().nonnegative()).optional()
    })
    .optional()
});

const messagesQuerySchema = z.object({
  after: z.coerce.number().int().min(0).default(0)
});

function notFound(sessionId: string) {
  return { error: 'SESSION_NOT_FOUND', message: `Session ${sessionId} not found` };
}

export function createSessionsRouter({ coordinator, outbox }: Services): Router {
  const router = Router();

  router.post('/v1/sessions', async (req, res) => {
    const parsed = newSessionBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const result = await coordinator.submitUserMessage(randomUUID(), parsed.data);
      return res.status(202).json(result);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      return res.status(500).json({ error: 'SESSION_FAILED', message });
    }
  });

  router.post('/v1/sessions/:sessionId/messages', async (req, res) => {
    const parsed = messageBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const result = await coordinator.submitUserMessage(req.params.sessionId, parsed.data);
      return res.status(202).json(result);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      return res.status(500).json({ error: 'MESSAGE_FAILED', message });
    }
  });

  router.get('/v1/sessions/:sessionId', (req, res) => {
    const snapshot = coordinator.getSnapshot(req.params.sessionId);
    if (!snapshot) return res.status(404).json(notFound(req.params.sessionId));
    return res.json({ ...snapshot, lastResponse: coordinator.getLastResponse(req.params.sessionId) });
  });

  router.get('/v1/sessions/:sessionId/messages', (req, res) => {
    const parsed = messagesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }
    if (!coordinator.getSnapshot(req.params.sessionId)) {
      return res.status(404).json(notFound(req.params.sessionId));
    }
    return res.json({ messages: outbox.list(req.params.sessionId, parsed.data.after) });
  });

  router.delete('/v1/sessions/:sessionId', async (req, res) => {
    try {
      const evicted = await coordinator.evictSession(req.params.sessionId);
      if (!evicted) return res.status(404).json(notFound(req.params.sessionId));
      return res.json({ ok: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      return res.status(500).json({ ok: false, error: 'DELETE_FAILED', message });
    }
  });

  return router;
}
