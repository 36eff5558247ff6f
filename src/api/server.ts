import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import { createReadStream } from 'fs';
import type { QueryFacade } from '@/run/query';
import type { RunOutcome } from '@/types/job';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('api');

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

function outcomeStatusCode(outcome: RunOutcome): number {
  switch (outcome.status) {
    case 'completed':
      return 200;
    case 'busy':
      return 409;
    case 'failed':
      return 500;
  }
}

async function handleRefresh(facade: QueryFacade, reply: FastifyReply) {
  const outcome = await facade.triggerRefresh();
  return reply.code(outcomeStatusCode(outcome)).send(outcome);
}

export function buildServer(facade: QueryFacade): FastifyInstance {
  const app = Fastify({ logger: false });

  app.addHook('onResponse', async (request, reply) => {
    logger.debug(
      { method: request.method, url: request.url, statusCode: reply.statusCode },
      'Request served'
    );
  });

  app.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));

  app.get('/api/summary', async () => {
    const view = facade.getSummary();
    if (view.kind === 'no_data') {
      return {
        error: 'No data yet. Report is being generated, check back shortly.',
        status: view.status,
        lastError: view.lastError,
      };
    }
    return view;
  });

  app.post('/api/refresh', async (_request, reply) => handleRefresh(facade, reply));
  app.get('/api/refresh', async (_request, reply) => handleRefresh(facade, reply));

  app.get('/download', async (_request, reply) => {
    const artifact = facade.getArtifact();
    if (!artifact.available) {
      return reply.code(404).send({ error: artifact.reason });
    }
    return reply
      .header('Content-Disposition', `attachment; filename="${artifact.downloadName}"`)
      .type(XLSX_CONTENT_TYPE)
      .send(createReadStream(artifact.filePath));
  });

  return app;
}
