/**
 * Tool invocation routes
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ToolListResponse } from '../../api/types.js';
import { toToolResponse } from '../outcome.js';

interface ToolParams {
  name: string;
}

/**
 * Register tool routes
 */
export async function toolsRoutes(server: FastifyInstance): Promise<void> {
  // List tools
  server.get('/tools', async (): Promise<ToolListResponse> => {
    const tools = server.state.service.createTools();
    return {
      service: server.state.service.name,
      tools: tools.list(),
    };
  });

  // Invoke a tool
  server.post(
    '/tools/:name',
    async (request: FastifyRequest<{ Params: ToolParams }>, reply: FastifyReply) => {
      const { name } = request.params;
      // A fresh registry per request: no handler state survives between calls
      const tools = server.state.service.createTools();
      const logger = server.state.logger.child({ requestId: request.id, tool: name });

      const outcome = await tools.execute(name, request.body, {
        requestId: request.id,
        logger,
      });

      const response = toToolResponse(outcome);
      if (response.statusCode !== 200) {
        logger.warn({ statusCode: response.statusCode, outcome: outcome.status }, 'Tool call rejected');
      }
      return reply.status(response.statusCode).send(response.body);
    }
  );
}
