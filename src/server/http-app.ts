import { Context, Hono } from 'hono';
import { StateSupervisor } from '../interfaces/state-supervisor';
import { EmulatorState, StatusPayload } from '../interfaces/common';
import { AgentError, errorMessage, invalidInput, isAgentError } from '../errors/agent-error';
import { Logger, silentLogger } from '../logging/logger';
import { StatusBroadcaster } from './status-broadcaster';
import { devErrorRequestSchema, devStateRequestSchema, modeRequestSchema, parseBody } from './request-schemas';

export interface AgentAppDependencies {
  supervisor: StateSupervisor;
  describeStatus: (state: EmulatorState) => StatusPayload;
  broadcaster: StatusBroadcaster;
  logger?: Logger;
  clock?: () => number;
}

/**
 * Details sent with a simulated crash when the caller gives none
 */
function simulatedCrashDetails(now: number): Record<string, unknown> {
  return { exitCode: 1, processId: 1234, timestamp: new Date(now).toISOString() };
}

function statusFor(error: AgentError): 400 | 409 | 503 {
  switch (error.kind) {
    case 'InvalidInput':
      return 400;
    case 'InvalidOperation':
      return 409;
    case 'ProbeUnavailable':
      return 503;
  }
}

async function readJson(c: Context, optional = false): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim().length === 0) {
    if (optional) {
      return {};
    }
    throw invalidInput('INVALID_JSON', 'Request body must be a JSON object');
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw invalidInput('INVALID_JSON', 'Request body is not valid JSON');
  }
}

/**
 * HTTP boundary: translates requests into supervisor calls
 */
export function createAgentApp(deps: AgentAppDependencies): Hono {
  const { supervisor, describeStatus, broadcaster } = deps;
  const logger = deps.logger ?? silentLogger;
  const clock = deps.clock ?? Date.now;
  const app = new Hono();

  app.use('*', async (c, next) => {
    const startedAt = Date.now();
    await next();
    logger.debug(`${c.req.method} ${c.req.path} ${c.res.status}`, { ms: Date.now() - startedAt });
  });

  app.get('/status', (c) => c.json(describeStatus(supervisor.getStatus())));

  app.post('/status/refresh', async (c) => {
    const state = await supervisor.reconcile();
    return c.json(describeStatus(state));
  });

  app.post('/dev/mode', async (c) => {
    const { mode } = parseBody(modeRequestSchema, await readJson(c), 'INVALID_MODE');
    const state = await supervisor.setMode(mode);
    return c.json(describeStatus(state));
  });

  app.post('/dev/state', async (c) => {
    const { running, demo } = parseBody(devStateRequestSchema, await readJson(c), 'INVALID_PAYLOAD');
    const state = await supervisor.setDevState(running, demo ?? null);
    return c.json(describeStatus(state));
  });

  app.post('/dev/error', async (c) => {
    const { code, message, details } = parseBody(devErrorRequestSchema, await readJson(c, true), 'INVALID_PAYLOAD');
    broadcaster.broadcastError(code, message, details ?? simulatedCrashDetails(clock()));
    logger.info('Simulated error broadcast', { code, clients: broadcaster.clientCount });
    return c.json({ status: 'success', message: 'Error simulated' });
  });

  app.notFound((c) =>
    c.json({ error: { kind: 'NotFound', code: 'NOT_FOUND', message: `No route for ${c.req.method} ${c.req.path}` } }, 404)
  );

  app.onError((error, c) => {
    if (isAgentError(error)) {
      logger.warn(`Request rejected: ${error.message}`, { kind: error.kind, code: error.code });
      return c.json({ error: error.toJSON() }, statusFor(error));
    }

    logger.error('Unhandled request error', { path: c.req.path, error: errorMessage(error) });
    return c.json({ error: { kind: 'Internal', code: 'INTERNAL_ERROR', message: 'Internal server error' } }, 500);
  });

  return app;
}
