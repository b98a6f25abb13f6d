import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { env } from './config/env';
import { loadEscalationConfig } from './config/escalation-config';
import { logger } from './observability/logger';
import { enableDefaultMetrics, httpRequestDuration } from './observability/metrics';
import { AgentSet, createAgentSet, initAgents, shutdownAgents } from './agents/agent-set';
import { AgentProviders } from './agents/types';
import { createDefaultProviders } from './agents/providers';
import { ContextStore } from './context/context-store';
import { createContextRepository } from './context/context-repository';
import { createEscalationQueue, EscalationQueue } from './escalation/escalation-queue';
import { EscalationConfig } from './escalation/types';
import { DeferredWorkQueue } from './orchestrator/deferred-work';
import { PipelineCoordinator } from './orchestrator/pipeline-coordinator';
import { RateLimiter, RateLimiterOptions } from './security/rate-limiter';
import { registerApiRoutes } from './api/routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppOptions {
  /** Skip REDIS_URL and use this client; pass null to force in-memory stores */
  redis?: Redis | null;
  enableMetrics?: boolean;
  providers?: Partial<AgentProviders>;
  escalationConfig?: EscalationConfig;
  rateLimit?: Partial<RateLimiterOptions>;
  agentTimeoutMs?: number;
  /** Derive the client address from X-Forwarded-For; defaults to TRUST_PROXY */
  trustProxy?: boolean;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  agents: AgentSet;
  coordinator: PipelineCoordinator;
  escalationQueue: EscalationQueue;
  deferredWork: DeferredWorkQueue;
  rateLimiter: RateLimiter;
  /** Stop accepting work, finish deferred jobs and release resources */
  shutdown(): Promise<void>;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.url) return undefined;

  const redisInstance = new Redis(env.redis.url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 5) return null; // stop retrying
      return Math.min(times * 200, 2000);
    },
    lazyConnect: true,
  });
  // Attach error handler BEFORE connect to prevent unhandled error events
  redisInstance.on('error', (err) => {
    logger.debug({ err: err.message }, 'Redis connection error (handled)');
  });

  try {
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    redisInstance.disconnect();
    return undefined;
  }
}

export async function buildApp(options: AppOptions = {}): Promise<AppContext> {
  const enableMetrics = options.enableMetrics ?? env.observability.enableMetrics;
  if (enableMetrics) enableDefaultMetrics();

  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: options.trustProxy ?? env.trustProxy,
    bodyLimit: 1_048_576, // 1 MB
    requestIdHeader: 'x-request-id',
    genReqId: () => uuidv4(),
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
    exposedHeaders: ['X-Request-ID', 'Retry-After'],
  });

  app.addHook('onSend', async (req, reply) => {
    reply.header('X-Request-ID', req.id);
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  app.setErrorHandler((err, req, reply) => {
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err, requestId: req.id, url: req.url }, 'Unhandled request error');
      return reply.status(500).send({ error: 'Internal server error' });
    }
    return reply.status(statusCode).send({ error: err.message });
  });

  // ───── Stores ─────
  const redis = options.redis === null ? undefined : options.redis ?? (await connectRedis());
  const contextStore = new ContextStore(createContextRepository(redis));
  const escalationQueue = createEscalationQueue(redis);

  // ───── Agents ─────
  const escalationConfig = options.escalationConfig ?? loadEscalationConfig();
  const providers: AgentProviders = {
    ...createDefaultProviders(escalationConfig.sentimentAgent),
    ...options.providers,
  };
  const agents = createAgentSet(providers, { timeoutMs: options.agentTimeoutMs });
  await initAgents(agents);

  // ───── Pipeline ─────
  const deferredWork = new DeferredWorkQueue();
  const coordinator = new PipelineCoordinator({
    agents,
    contextStore,
    escalationQueue,
    deferredWork,
    thresholds: escalationConfig.thresholds,
  });
  const rateLimiter = new RateLimiter(options.rateLimit);

  registerApiRoutes(app, { coordinator, agents, escalationQueue, rateLimiter });
  registerHealthRoutes(app, { redis, enableMetrics });

  const shutdown = async (): Promise<void> => {
    await app.close();
    await deferredWork.drain();
    await shutdownAgents(agents);
    rateLimiter.stop();
    if (redis && options.redis === undefined) {
      redis.disconnect();
    }
  };

  logger.info({ redis: Boolean(redis), metrics: enableMetrics }, 'Application built');
  return { app, redis, agents, coordinator, escalationQueue, deferredWork, rateLimiter, shutdown };
}
