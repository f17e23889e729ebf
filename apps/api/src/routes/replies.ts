import { Router } from 'express';
import { SessionNotFoundError } from '../errors.js';
import { workerReplySchema } from '../workers/contracts.js';
import type { Services } from '../app.js';

/** Inbound channel for worker replies. */
export function createRepliesRouter({ coordinator }: Pick<Services, 'coordinator'>): Router {
  const router = Router();

  router.post('/v1/replies', async (req, res) => {
    const parsed = workerReplySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const { status } = await coordinator.submitWorkerReply(parsed.data);
      return res.status(202).json({ status });
    } catch (err) {
      if (err instanceof SessionNotFoundError) {
        return res.status(404).json({ error: err.code, message: err.message });
      }
      const message = err instanceof Error ? err.message : 'Unknown error';
      return res.status(500).json({ error: 'REPLY_FAILED', message });
    }
  });

  return router;
}
