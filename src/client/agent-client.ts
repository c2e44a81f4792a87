import { z } from 'zod';
import { OperatingMode, StatusPayload } from '../interfaces/common';

const systemStatsSchema = z.object({
  cpuUsage: z.number().nullable(),
  memoryUsage: z.number().nullable(),
  loadAverage: z.number().nullable()
});

export const statusPayloadSchema = z.object({
  running: z.boolean(),
  currentDemo: z.string().nullable(),
  mode: z.enum(['REAL', 'SIMULATED']),
  lastUpdated: z.string(),
  uptime: z.number(),
  pid: z.number().nullable(),
  process: z
    .object({
      pid: z.number(),
      cpuPercent: z.number(),
      memoryPercent: z.number()
    })
    .nullable(),
  systemStats: systemStatsSchema
});

const errorBodySchema = z.object({
  error: z.object({
    kind: z.string(),
    code: z.string(),
    message: z.string()
  })
});

/**
 * Failure reported by a running agent, or a transport failure (status 0)
 */
export class AgentClientError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly kind?: string,
    readonly code?: string
  ) {
    super(message);
    this.name = 'AgentClientError';
  }
}

/**
 * HTTP client for a running agent
 */
export class AgentClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string, private readonly fetchImpl: typeof fetch = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  getStatus(): Promise<StatusPayload> {
    return this.requestStatus('GET', '/status');
  }

  refresh(): Promise<StatusPayload> {
    return this.requestStatus('POST', '/status/refresh');
  }

  setMode(mode: OperatingMode): Promise<StatusPayload> {
    return this.requestStatus('POST', '/dev/mode', { mode });
  }

  setDevState(running: boolean, demo: string | null): Promise<StatusPayload> {
    return this.requestStatus('POST', '/dev/state', { running, demo });
  }

  private async requestStatus(method: 'GET' | 'POST', path: string, body?: Record<string, unknown>): Promise<StatusPayload> {
    const url = `${this.baseUrl}${path}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: body ? { 'content-type': 'application/json' } : undefined,
        body: body ? JSON.stringify(body) : undefined
      });
    } catch (error) {
      throw new AgentClientError(`Agent unreachable at ${this.baseUrl}: ${error instanceof Error ? error.message : 'Unknown error'}`, 0);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new AgentClientError(`Agent returned a non-JSON response (HTTP ${response.status})`, response.status);
    }

    if (!response.ok) {
      const parsedError = errorBodySchema.safeParse(payload);
      if (parsedError.success) {
        const { kind, code, message } = parsedError.data.error;
        throw new AgentClientError(message, response.status, kind, code);
      }
      throw new AgentClientError(`Agent request failed with HTTP ${response.status}`, response.status);
    }

    const parsed = statusPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AgentClientError('Agent returned an unexpected status payload', response.status);
    }
    return parsed.data;
  }
}
