import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import { z } from 'zod';
import type { Assistant } from '../app';

const askBody = z.object({
  question: z.string().trim().min(1)
});

export function buildServer(assistant: Assistant, options: FastifyServerOptions = { logger: true }): FastifyInstance {
  const server = Fastify(options);

  server.get('/healthz', async () => ({ status: 'ok', tools: assistant.registry.names() }));

  server.post('/ask', async (req, reply) => {
    const parsed = askBody.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'invalid_request', details: parsed.error.issues });
    }
    // Each request gets its own conversation.
    const session = assistant.createSession();
    const outcome = await session.ask(parsed.data.question);
    return {
      answer: outcome.answer,
      toolCall: outcome.toolCall ?? null,
      messages: session.conversation.messages
    };
  });

  return server;
}
