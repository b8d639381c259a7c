// src/routes/syncRoutes.ts
import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { SyncError, type SyncErrorCode } from '../lib/errors.js';
import type { SyncContext } from '../lib/syncContext.js';
import { normalizeAll } from '../utils/eventNormalizer.js';
import { renderApprovalPrompt, renderRunReport } from '../utils/approvalRenderer.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * HTTP status for each deliberate failure
 */
const STATUS_BY_CODE: Record<SyncErrorCode, number> = {
  InvalidWindow: 400,
  InvalidSelection: 400,
  AuthExpired: 401,
  ApprovalInProgress: 409,
  NoPendingApproval: 409,
  MalformedEvent: 422,
  LoginFailed: 502,
  PortalStepFailed: 502,
  SourceUnavailable: 503,
};

const RunSyncBodySchema = z
  .object({
    horizonDays: z.number().optional(),
    targets: z.array(z.enum(['portal', 'google'])).min(1).optional(),
  })
  .default({});

const DecisionBodySchema = z.object({
  selection: z.string(),
});

const AbandonBodySchema = z
  .object({
    reason: z.string().min(1).optional(),
  })
  .nullish();

const SourceParamsSchema = z.object({
  source: z.enum(['google', 'outlook']),
});

const EventsQuerySchema = z.object({
  days: z.coerce.number().int().positive().max(90).optional(),
});

export interface SyncRoutesOptions {
  /** Resolved on first use so the server starts without calendar credentials */
  getContext: () => SyncContext;
}

/**
 * Send a SyncError with its mapped status; anything else is a 500
 */
function sendError(fastify: FastifyInstance, reply: FastifyReply, error: unknown) {
  if (error instanceof SyncError) {
    return reply.code(STATUS_BY_CODE[error.code]).send({ error: error.code, message: error.message });
  }
  fastify.log.error({ err: error }, 'Unhandled sync error');
  return reply.code(500).send({
    error: 'InternalError',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}

/**
 * Register reconciliation routes
 *
 * @param fastify - Fastify instance
 * @param options - Lazily built sync context
 */
export async function syncRoutes(fastify: FastifyInstance, options: SyncRoutesOptions): Promise<void> {
  /**
   * POST /sync
   * Fetch both calendars and open an approval request
   */
  fastify.post('/sync', async (request, reply) => {
    const bodyResult = RunSyncBodySchema.safeParse(request.body ?? undefined);
    if (!bodyResult.success) {
      return reply.code(400).send({ error: 'Invalid sync request', details: bodyResult.error.issues });
    }

    try {
      const { orchestrator, displayTimeZone } = options.getContext();
      const pass = await orchestrator.runSync(bodyResult.data);

      if (pass.status === 'up_to_date') {
        return reply.code(200).send({ status: pass.status, report: pass.report });
      }
      return reply.code(202).send({
        status: pass.status,
        window: pass.window,
        request: pass.request,
        prompt: renderApprovalPrompt(pass.request, displayTimeZone),
      });
    } catch (error) {
      return sendError(fastify, reply, error);
    }
  });

  /**
   * GET /sync/approval
   * Show the request waiting for a decision
   */
  fastify.get('/sync/approval', async (_request, reply) => {
    try {
      const { orchestrator, displayTimeZone } = options.getContext();
      const pending = orchestrator.pendingApproval();
      if (!pending) {
        return reply.code(404).send({ error: 'NoPendingApproval', message: 'No approval request is pending' });
      }
      return { request: pending, prompt: renderApprovalPrompt(pending, displayTimeZone) };
    } catch (error) {
      return sendError(fastify, reply, error);
    }
  });

  /**
   * POST /sync/approval
   * Submit the human decision ("all", "none", "1,3", or "cancel")
   */
  fastify.post('/sync/approval', async (request, reply) => {
    const bodyResult = DecisionBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.code(400).send({ error: 'Invalid decision', details: bodyResult.error.issues });
    }

    try {
      const { orchestrator } = options.getContext();
      if (bodyResult.data.selection.trim().toLowerCase() === 'cancel') {
        const abandoned = orchestrator.abandon('cancelled by user');
        return { status: 'abandoned', request: abandoned };
      }

      const report = await orchestrator.submitDecision(bodyResult.data.selection);
      return { status: 'applied', report, summary: renderRunReport(report) };
    } catch (error) {
      return sendError(fastify, reply, error);
    }
  });

  /**
   * DELETE /sync/approval
   * Abandon the pending request without applying anything
   */
  fastify.delete('/sync/approval', async (request, reply) => {
    const bodyResult = AbandonBodySchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.code(400).send({ error: 'Invalid abandon request', details: bodyResult.error.issues });
    }

    try {
      const { orchestrator } = options.getContext();
      const abandoned = orchestrator.abandon(bodyResult.data?.reason ?? 'cancelled by user');
      return { status: 'abandoned', request: abandoned };
    } catch (error) {
      return sendError(fastify, reply, error);
    }
  });

  /**
   * GET /calendars/:source/events
   * Upcoming events of one calendar, normalized
   */
  fastify.get('/calendars/:source/events', async (request, reply) => {
    const paramsResult = SourceParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.code(404).send({ error: 'Unknown calendar source', details: paramsResult.error.issues });
    }
    const queryResult = EventsQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      return reply.code(400).send({ error: 'Invalid query', details: queryResult.error.issues });
    }

    try {
      const { sources, defaultHorizonDays } = options.getContext();
      const start = new Date();
      const days = queryResult.data.days ?? defaultHorizonDays;
      const window = { start, end: new Date(start.getTime() + days * DAY_MS) };
      const events = normalizeAll(await sources[paramsResult.data.source].listEvents(window));
      return { source: paramsResult.data.source, window, events };
    } catch (error) {
      return sendError(fastify, reply, error);
    }
  });
}
