import { Hono } from 'hono';
import { validatePipelineRequest, type PipelineCoordinator } from '../agents/coordinator.js';
import { readJsonBody } from '../lib/http-body-guard.js';

const MAX_BODY_BYTES = 16 * 1024;

/**
 * Digest routes.
 *
 * POST /api/digest  body: PipelineRequest JSON → PipelineOutput JSON
 *
 * The coordinator is resolved per request so the app can be imported
 * without LLM credentials configured.
 */
export function createDigestRoutes(getCoordinator: () => PipelineCoordinator): Hono {
  const digest = new Hono();

  digest.post('/', async (c) => {
    const body = await readJsonBody(c, MAX_BODY_BYTES);
    if (!body.ok) return body.response;

    const validation = validatePipelineRequest(body.data);
    if (!validation.success) {
      return c.json({ error: 'Invalid digest request', issues: validation.issues }, 400);
    }

    const log = c.get('log');
    log.info({ category: validation.data.category, count: validation.data.count }, 'Digest requested');
    const output = await getCoordinator().run(validation.data);
    log.info({ runId: output.runId, status: output.status }, 'Digest finished');

    return c.json(output);
  });

  return digest;
}
