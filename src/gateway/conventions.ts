import type { ToolDocument } from '../contracts/tool.js';
import type { ConventionStrategy } from './transport.js';

/*
 * Candidate calling conventions per operation, in the order they are tried.
 * Tool servers expose either plain request/response routes or an event-stream
 * route; which one is only discovered by probing.
 */

export function listToolsConventions(): readonly ConventionStrategy[] {
  return [
    { method: 'GET', path: '/tools', mode: 'json' },
    { method: 'POST', path: '/tools/list', body: {}, mode: 'json' },
    { method: 'POST', path: '/mcp/list_tools', body: {}, mode: 'json' },
    { method: 'POST', path: '/sse/list_tools', body: {}, mode: 'event-stream' },
  ];
}

export function describeToolConventions(name: string): readonly ConventionStrategy[] {
  const body = { name };
  return [
    { method: 'POST', path: '/tools/describe', body, mode: 'json' },
    { method: 'POST', path: '/mcp/describe_tool', body, mode: 'json' },
    { method: 'POST', path: '/sse/describe_tool', body, mode: 'event-stream' },
  ];
}

export function invokeToolConventions(name: string, args: ToolDocument): readonly ConventionStrategy[] {
  const body = { name, arguments: args };
  return [
    { method: 'POST', path: '/tools/invoke', body, mode: 'json' },
    { method: 'POST', path: '/mcp/invoke_tool', body, mode: 'json' },
    { method: 'POST', path: '/sse/invoke_tool', body, mode: 'event-stream' },
  ];
}
