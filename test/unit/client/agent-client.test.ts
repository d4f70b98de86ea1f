import { describe, it, expect } from 'vitest';
import { AgentClient, PRIVATE_SCOPE_URI } from '../../../src/client/agent-client.js';
import { OperatorClient } from '../../../src/client/operator-client.js';
import { ApiRequestError, ConfigError } from '../../../src/core/errors.js';

interface RecordedCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

type Reply = Response | Error;

/** fetch stand-in answering from a queue of canned replies. */
function stubFetch(replies: Reply[]): { fetch: typeof fetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({
      url: input instanceof Request ? input.url : input.toString(),
      method: init?.method ?? 'GET',
      headers,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    const reply = replies.shift();
    if (!reply) throw new Error('No reply queued');
    if (reply instanceof Error) throw reply;
    return reply;
  };
  return { fetch: fetchImpl, calls };
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const ENTRY = {
  scope: 'uplift://agent/researcher/private',
  key: 'note',
  value: 'qubits',
  written_by: 'researcher',
  created_at: 1,
  updated_at: 2,
};

describe('AgentClient', () => {
  it('should be configured from the environment', () => {
    expect(() => AgentClient.fromEnv({})).toThrow(ConfigError);
    expect(AgentClient.fromEnv({ UPLIFT_API_URL: 'http://127.0.0.1:7420', UPLIFT_SESSION_TOKEN: 'upl_test' }))
      .toBeInstanceOf(AgentClient);
  });

  it('should send authenticated JSON requests', async () => {
    const stub = stubFetch([json(201, { scope: ENTRY.scope, key: 'note', updated_at: 2 })]);
    const client = new AgentClient({ apiUrl: 'http://runtime.test/', token: 'upl_test', fetch: stub.fetch });

    const result = await client.store(PRIVATE_SCOPE_URI, 'note', 'qubits');

    expect(result).toEqual({ scope: ENTRY.scope, key: 'note', updated_at: 2 });
    expect(stub.calls).toEqual([{
      url: 'http://runtime.test/memory/store',
      method: 'POST',
      headers: {
        accept: 'application/json',
        authorization: 'Bearer upl_test',
        'content-type': 'application/json',
      },
      body: { scope: 'uplift://agent/private', key: 'note', value: 'qubits' },
    }]);
  });

  it('should return null for missing memory keys', async () => {
    const stub = stubFetch([json(404, { error: 'Memory key not found', code: 'NOT_FOUND' }), json(200, ENTRY)]);
    const client = new AgentClient({ apiUrl: 'http://runtime.test', token: 'upl_test', fetch: stub.fetch });

    expect(await client.get(PRIVATE_SCOPE_URI, 'absent')).toBeNull();
    expect(await client.get(PRIVATE_SCOPE_URI, 'note')).toEqual(ENTRY);
    expect(stub.calls[0].url).toBe(
      'http://runtime.test/memory/get?scope=uplift%3A%2F%2Fagent%2Fprivate&key=absent',
    );
  });

  it('should raise API errors with status and code', async () => {
    const stub = stubFetch([json(403, {
      error: 'Agent "writer" is not authorized to read scope uplift://agent/researcher/private',
      code: 'SCOPE_ACCESS_DENIED',
    })]);
    const client = new AgentClient({ apiUrl: 'http://runtime.test', token: 'upl_test', fetch: stub.fetch });

    const error = await client.get(ENTRY.scope, 'note').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error).toMatchObject({ status: 403, code: 'SCOPE_ACCESS_DENIED' });
  });

  it('should reject responses that do not match the expected shape', async () => {
    const stub = stubFetch([json(202, { task_id: 42 })]);
    const client = new AgentClient({ apiUrl: 'http://runtime.test', token: 'upl_test', fetch: stub.fetch });

    await expect(client.delegate({ targetAgentId: 'writer', objective: 'x' }))
      .rejects.toMatchObject({ code: 'INVALID_RESPONSE', status: 202 });
  });

  it('should report an idle task queue as null', async () => {
    const stub = stubFetch([new Response(null, { status: 204 })]);
    const client = new AgentClient({ apiUrl: 'http://runtime.test', token: 'upl_test', fetch: stub.fetch });

    expect(await client.currentTask()).toBeNull();
  });

  it('should retry connection failures', async () => {
    const stub = stubFetch([
      new TypeError('fetch failed'),
      json(200, { agents: [] }),
    ]);
    const client = new AgentClient({ apiUrl: 'http://runtime.test', token: 'upl_test', fetch: stub.fetch });

    expect(await client.directory()).toEqual([]);
    expect(stub.calls).toHaveLength(2);
  });

  it('should not resend a task completion after a lost connection', async () => {
    const stub = stubFetch([
      new TypeError('fetch failed'),
      json(409, { error: 'Task t1 is completed', code: 'INVALID_STATE' }),
    ]);
    const client = new AgentClient({ apiUrl: 'http://runtime.test', token: 'upl_test', fetch: stub.fetch });

    await expect(client.complete({ taskId: 't1', status: 'success' })).rejects.toThrow('fetch failed');
    expect(stub.calls).toHaveLength(1);
  });

  it('should retry memory queries after a lost connection', async () => {
    const stub = stubFetch([
      new TypeError('fetch failed'),
      json(200, { results: [] }),
    ]);
    const client = new AgentClient({ apiUrl: 'http://runtime.test', token: 'upl_test', fetch: stub.fetch });

    expect(await client.query('quantum', [PRIVATE_SCOPE_URI])).toEqual([]);
    expect(stub.calls).toHaveLength(2);
  });

  it('should poll an approval until it is decided', async () => {
    const approval = {
      request_id: 'AR-1-0a1b2c3d',
      agent: 'writer',
      action: 'publish',
      details: {},
      risk_level: 'high',
      category: null,
      status: 'pending',
      created_at: 1,
      timeout_at: 2,
      approved_by: null,
      approved_at: null,
      denial_reason: null,
      comment: null,
    };
    const stub = stubFetch([
      json(200, approval),
      json(200, approval),
      json(200, { ...approval, status: 'denied', approved_by: 'bob', denial_reason: 'no' }),
    ]);
    const client = new AgentClient({ apiUrl: 'http://runtime.test', token: 'upl_test', fetch: stub.fetch });

    const decided = await client.waitForApproval('AR-1-0a1b2c3d', { pollIntervalMs: 1 });

    expect(decided.status).toBe('denied');
    expect(decided.denial_reason).toBe('no');
    expect(stub.calls).toHaveLength(3);
    expect(stub.calls[0].url).toBe('http://runtime.test/approvals/AR-1-0a1b2c3d');
  });
});

describe('OperatorClient', () => {
  it('should report an unreachable runtime', async () => {
    const stub = stubFetch([new TypeError('fetch failed')]);
    const client = new OperatorClient({ apiUrl: 'http://runtime.test', adminKey: 'test-admin-key', fetch: stub.fetch });

    expect(await client.isReachable()).toBe(false);
    expect(stub.calls).toHaveLength(1);
  });

  it('should parse kill switch results by mode', async () => {
    const stub = stubFetch([json(200, { mode: 'graceful', stopped: ['writer'] })]);
    const client = new OperatorClient({ apiUrl: 'http://runtime.test', adminKey: 'test-admin-key', fetch: stub.fetch });

    const result = await client.kill('graceful');

    expect(result).toEqual({ mode: 'graceful', stopped: ['writer'] });
    expect(stub.calls[0].headers.authorization).toBe('Bearer test-admin-key');
    expect(stub.calls[0].body).toEqual({ mode: 'graceful' });
  });
});
