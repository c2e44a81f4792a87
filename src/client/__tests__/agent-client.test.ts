import { AgentClient, AgentClientError } from '../agent-client';
import { StatusPayload } from '../../interfaces/common';

const status: StatusPayload = {
  running: true,
  currentDemo: 'Wizball',
  mode: 'SIMULATED',
  lastUpdated: '2024-05-01T12:00:00.000Z',
  uptime: 12,
  pid: null,
  process: null,
  systemStats: { cpuUsage: 3.5, memoryUsage: 41.2, loadAverage: null }
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('AgentClient', () => {
  let fetchImpl: jest.Mock<Promise<Response>, Parameters<typeof fetch>>;
  let client: AgentClient;

  beforeEach(() => {
    fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    client = new AgentClient('http://127.0.0.1:5000/', fetchImpl);
  });

  it('should fetch the status', async () => {
    fetchImpl.mockResolvedValue(jsonResponse(status));

    await expect(client.getStatus()).resolves.toEqual(status);
    expect(fetchImpl).toHaveBeenCalledWith('http://127.0.0.1:5000/status', {
      method: 'GET',
      headers: undefined,
      body: undefined
    });
  });

  it('should request a refresh', async () => {
    fetchImpl.mockResolvedValue(jsonResponse(status));

    await client.refresh();

    expect(fetchImpl).toHaveBeenCalledWith('http://127.0.0.1:5000/status/refresh', {
      method: 'POST',
      headers: undefined,
      body: undefined
    });
  });

  it('should send a mode switch as JSON', async () => {
    fetchImpl.mockResolvedValue(jsonResponse(status));

    await client.setMode('SIMULATED');

    expect(fetchImpl).toHaveBeenCalledWith('http://127.0.0.1:5000/dev/mode', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"mode":"SIMULATED"}'
    });
  });

  it('should send the simulated state', async () => {
    fetchImpl.mockResolvedValue(jsonResponse(status));

    await client.setDevState(true, 'Wizball');

    expect(fetchImpl).toHaveBeenCalledWith('http://127.0.0.1:5000/dev/state', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"running":true,"demo":"Wizball"}'
    });
  });

  it('should surface the agent error body', async () => {
    fetchImpl.mockResolvedValue(
      jsonResponse(
        { error: { kind: 'InvalidOperation', code: 'MODE_MISMATCH', message: 'Must be in SIMULATED mode to set state directly' } },
        409
      )
    );

    const failure = client.setDevState(true, 'Wizball');

    await expect(failure).rejects.toBeInstanceOf(AgentClientError);
    await expect(failure).rejects.toMatchObject({
      message: 'Must be in SIMULATED mode to set state directly',
      status: 409,
      kind: 'InvalidOperation',
      code: 'MODE_MISMATCH'
    });
  });

  it('should report an error response without an error body', async () => {
    fetchImpl.mockResolvedValue(jsonResponse({ oops: true }, 502));

    await expect(client.getStatus()).rejects.toMatchObject({
      message: 'Agent request failed with HTTP 502',
      status: 502
    });
  });

  it('should report an unreachable agent', async () => {
    fetchImpl.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5000'));

    await expect(client.getStatus()).rejects.toMatchObject({
      message: 'Agent unreachable at http://127.0.0.1:5000: connect ECONNREFUSED 127.0.0.1:5000',
      status: 0
    });
  });

  it('should reject a non-JSON response', async () => {
    fetchImpl.mockResolvedValue(new Response('<html>proxy error</html>', { status: 200 }));

    await expect(client.getStatus()).rejects.toMatchObject({
      message: 'Agent returned a non-JSON response (HTTP 200)',
      status: 200
    });
  });

  it('should reject a payload of the wrong shape', async () => {
    fetchImpl.mockResolvedValue(jsonResponse({ running: 'yes' }));

    await expect(client.getStatus()).rejects.toThrow('Agent returned an unexpected status payload');
  });
});
