import { describe, it, expect } from 'vitest';
import { ToolGatewayClient } from './client.js';
import { ConfigurationError, GatewayError } from '../runner/errors.js';
import { SwarmLogger, type StructuredLogEntry } from '../runner/logger.js';
import { FakeToolServer, conventionServer, unreachableFetch } from '../testing/fake-tool-server.js';
import type { FetchLike } from './transport.js';

const BASE_URL = 'http://tools.test';

function capturingLogger(entries: StructuredLogEntry[]): SwarmLogger {
  return new SwarmLogger({ level: 'debug', silent: true, sink: entry => entries.push(entry) });
}

describe('ToolGatewayClient configuration', () => {
  it('strips trailing slashes from the base url', () => {
    const client = new ToolGatewayClient({ baseUrl: 'http://tools.test///' });
    expect(client.baseUrl).toBe('http://tools.test');
    expect(client.enabled).toBe(true);
    expect(client.timeoutMs).toBe(12_000);
  });

  it('is disabled without a base url and rejects every operation', async () => {
    const server = new FakeToolServer();
    const client = new ToolGatewayClient({ fetch: server.fetch });

    expect(client.enabled).toBe(false);
    await expect(client.listTools()).rejects.toBeInstanceOf(ConfigurationError);
    await expect(client.describeTool('search')).rejects.toBeInstanceOf(ConfigurationError);
    await expect(client.invokeTool('search', {})).rejects.toBeInstanceOf(ConfigurationError);
    expect(server.requests).toHaveLength(0);
  });

  it('treats a blank base url as disabled', () => {
    expect(new ToolGatewayClient({ baseUrl: '  ' }).enabled).toBe(false);
  });
});

describe('ToolGatewayClient.listTools', () => {
  it('resolves an empty list when the server is unreachable', async () => {
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: unreachableFetch });
    await expect(client.listTools()).resolves.toEqual([]);
  });

  it('finds tools on a server that only speaks the third convention', async () => {
    const server = conventionServer('mcp', [{ name: 'web_search', description: 'Search the web' }]);
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch });

    const tools = await client.listTools();

    expect(tools).toEqual([{ name: 'web_search', description: 'Search the web', input_schema: {} }]);
    expect(server.paths).toEqual(['/tools', '/tools/list', '/mcp/list_tools']);
  });

  it('reads the listing from an event stream', async () => {
    const server = conventionServer('sse', [{ name: 'crm_update' }]);
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch });

    const tools = await client.listTools();

    expect(tools).toEqual([{ name: 'crm_update', description: '', input_schema: {} }]);
    expect(server.requests[3]).toMatchObject({ path: '/sse/list_tools', accept: 'text/event-stream' });
  });

  it('skips a convention whose tools array has no valid entries', async () => {
    const server = new FakeToolServer({
      'GET /tools': { json: { tools: [{ description: 'nameless' }, 'junk'] } },
      'POST /tools/list': { json: { tools: [{ name: 'notify_email', schema: { type: 'object' } }] } },
    });
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch });

    const tools = await client.listTools();

    expect(tools).toEqual([{ name: 'notify_email', description: '', input_schema: { type: 'object' } }]);
    expect(server.paths).toEqual(['/tools', '/tools/list']);
  });

  it('logs each failed attempt at debug and exhaustion at warn', async () => {
    const entries: StructuredLogEntry[] = [];
    const client = new ToolGatewayClient({
      baseUrl: BASE_URL,
      fetch: new FakeToolServer().fetch,
      logger: capturingLogger(entries),
    });

    await client.listTools();

    expect(entries.filter(e => e.event === 'gateway.attempt_failed')).toHaveLength(4);
    const exhausted = entries.filter(e => e.event === 'gateway.exhausted');
    expect(exhausted).toHaveLength(1);
    expect(exhausted[0]?.level).toBe('warn');
    expect(exhausted[0]?.context).toEqual({ lastPath: '/sse/list_tools', attempts: 4 });
  });
});

describe('ToolGatewayClient.describeTool', () => {
  it('returns the same document on repeated calls', async () => {
    const server = conventionServer('tools', [{ name: 'web_search', description: 'Search the web' }]);
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch });

    const first = await client.describeTool('web_search');
    const second = await client.describeTool('web_search');

    expect(first).toEqual({ name: 'web_search', description: 'Search the web' });
    expect(second).toEqual(first);
  });

  it('wraps a non-object JSON body', async () => {
    const server = new FakeToolServer({ 'POST /tools/describe': { json: ['a', 'b'] } });
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch });

    await expect(client.describeTool('lister')).resolves.toEqual({ data: ['a', 'b'] });
  });

  it('rejects with the last attempted path when every convention fails', async () => {
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: new FakeToolServer().fetch });

    const error = await client.describeTool('missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GatewayError);
    if (error instanceof GatewayError) {
      expect(error.message).toBe("Unable to describe tool 'missing'.");
      expect(error.path).toBe('/sse/describe_tool');
      expect(error.cause).toBeInstanceOf(GatewayError);
    }
  });
});

describe('ToolGatewayClient event streams', () => {
  it('skips non-JSON payloads and returns the first JSON object', async () => {
    const server = new FakeToolServer({
      'POST /sse/invoke_tool': {
        stream: [': keep-alive', 'data: warming up', 'data: 42', 'data: {"ok":true,"n":1}', 'data: {"n":2}', 'data: [DONE]'],
      },
    });
    const entries: StructuredLogEntry[] = [];
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch, logger: capturingLogger(entries) });

    await expect(client.invokeTool('search', { query: 'x' })).resolves.toEqual({ ok: true, n: 1 });
    expect(entries.filter(e => e.event === 'gateway.stream_payload_skipped')).toHaveLength(2);
  });

  it('fails when the stream ends with only the sentinel', async () => {
    const server = new FakeToolServer({ 'POST /sse/invoke_tool': { stream: ['data: [DONE]'] } });
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch });

    await expect(client.invokeTool('search')).rejects.toThrow("Unable to invoke tool 'search'.");
  });

  it('ignores payloads after the sentinel', async () => {
    const server = new FakeToolServer({
      'POST /sse/invoke_tool': { stream: ['data: [DONE]', 'data: {"late":true}'] },
    });
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch });

    await expect(client.invokeTool('search')).rejects.toBeInstanceOf(GatewayError);
  });
});

describe('ToolGatewayClient.invokeTool', () => {
  it('sends the name and arguments and falls through HTTP errors', async () => {
    const server = new FakeToolServer({
      'POST /tools/invoke': { status: 500, json: { error: 'boom' } },
      'POST /mcp/invoke_tool': { text: 'not json' },
      'POST /sse/invoke_tool': { stream: ['data: {"result":"done"}'] },
    });
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch });

    await expect(client.invokeTool('crm_update', { ticket_id: 'T-1' })).resolves.toEqual({ result: 'done' });
    expect(server.requests.map(r => r.body)).toEqual([
      { name: 'crm_update', arguments: { ticket_id: 'T-1' } },
      { name: 'crm_update', arguments: { ticket_id: 'T-1' } },
      { name: 'crm_update', arguments: { ticket_id: 'T-1' } },
    ]);
  });

  it('defaults arguments to an empty object', async () => {
    const server = conventionServer('tools', [{ name: 'ping', run: () => ({ pong: true }) }]);
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: server.fetch });

    await expect(client.invokeTool('ping')).resolves.toEqual({ pong: true });
    expect(server.requests[0]?.body).toEqual({ name: 'ping', arguments: {} });
  });

  it('moves to the next convention when an attempt times out', async () => {
    const paths: string[] = [];
    const hanging: FetchLike = (url, init) => {
      const path = new URL(url).pathname;
      paths.push(path);
      if (path === '/mcp/invoke_tool') {
        return Promise.resolve(new Response(JSON.stringify({ answered: 'mcp' })));
      }
      return new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    };
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, timeoutMs: 50, fetch: hanging });

    await expect(client.invokeTool('search', { query: 'x' })).resolves.toEqual({ answered: 'mcp' });
    expect(paths).toEqual(['/tools/invoke', '/mcp/invoke_tool']);
  });

  it('cancels the body of an error response', async () => {
    let cancelled = false;
    const failing: FetchLike = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          cancel() {
            cancelled = true;
          },
        }),
        { status: 500 }
      );
    const client = new ToolGatewayClient({ baseUrl: BASE_URL, fetch: failing });

    await expect(client.invokeTool('search')).rejects.toBeInstanceOf(GatewayError);
    expect(cancelled).toBe(true);
  });
});
