/**
 * Shared test utilities for integration tests
 * Routes delegated HTTP calls to in-process Fastify instances instead of the network
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { FetchLike } from '../delegation/client.js';
import type { CandidateEvent } from '../api/types.js';

/**
 * Build a fetch that dispatches by origin to Fastify's inject
 * Unknown origins fail the way a DNS miss does
 */
export function createInjectFetch(servers: Record<string, FastifyInstance>): FetchLike {
  return async (url, init) => {
    const target = new URL(url);
    const server = servers[target.origin];
    if (!server) {
      throw new TypeError('fetch failed', {
        cause: new Error(`getaddrinfo ENOTFOUND ${target.hostname}`),
      });
    }

    const response = init.method === 'GET'
      ? await server.inject({ method: 'GET', url: `${target.pathname}${target.search}` })
      : await server.inject({
          method: 'POST',
          url: `${target.pathname}${target.search}`,
          headers: { 'content-type': 'application/json' },
          payload: typeof init.body === 'string' ? init.body : undefined,
        });

    return new Response(response.body, {
      status: response.statusCode,
      headers: { 'content-type': String(response.headers['content-type'] ?? 'application/json') },
    });
  };
}

/**
 * Stand-in for the external event store
 * Stores events in memory; statuses queued in `failures` are answered first
 */
export interface FakeEventStore {
  server: FastifyInstance;
  received: Array<Record<string, unknown>>;
  failures: Array<{ status: number; body: string } | null>;
}

export async function createFakeEventStore(): Promise<FakeEventStore> {
  const server = Fastify({ logger: false });
  const store: FakeEventStore = { server, received: [], failures: [] };

  server.post('/api/events', async (request, reply) => {
    const body = request.body;
    const event: Record<string, unknown> =
      typeof body === 'object' && body !== null ? Object.fromEntries(Object.entries(body)) : {};
    store.received.push(event);

    const failure = store.failures.shift();
    if (failure) {
      return reply.status(failure.status).type('text/plain').send(failure.body);
    }
    return reply.status(201).send({ id: `evt_${store.received.length}`, ...event });
  });

  await server.ready();
  return store;
}

/**
 * Stand-in for the vision service
 */
export interface FakeVisionService {
  server: FastifyInstance;
  calls: number;
  events: CandidateEvent[];
  confidence: number;
}

export async function createFakeVisionService(events: CandidateEvent[] = []): Promise<FakeVisionService> {
  const server = Fastify({ logger: false, bodyLimit: 50 * 1024 * 1024 });
  const vision: FakeVisionService = { server, calls: 0, events, confidence: 0.87 };

  server.post('/analyze', async () => {
    vision.calls += 1;
    return { events: vision.events, confidence: vision.confidence };
  });

  await server.ready();
  return vision;
}

/**
 * Base64 upload of the given bytes
 */
export function uploadOf(content: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const bytes = Buffer.from(content);
  return {
    team_id: 5,
    file_content: bytes.toString('base64'),
    file_name: 'spring-schedule.jpg',
    file_size: bytes.length,
    mime_type: 'image/jpeg',
    uploaded_at: '2026-03-01T12:00:00Z',
    ...overrides,
  };
}
