import { describe, it, expect } from 'vitest';
import { DEFAULT_SYNTHESIS, researchTicket } from './researcher.js';
import { InMemoryKnowledgeStore, type KnowledgeStore } from '../kb/store.js';
import { ToolGatewayClient } from '../gateway/client.js';
import { conventionServer } from '../testing/fake-tool-server.js';
import { makeTicket, quietContext, scriptedAugmenter } from '../testing/stage-fixtures.js';

async function seededStore(): Promise<InMemoryKnowledgeStore> {
  const store = new InMemoryKnowledgeStore();
  await store.seedDefaults();
  return store;
}

const twoHitStore: KnowledgeStore = {
  search: async () => [
    { source: 'faq', content: 'Restart the sync agent.' },
    { source: 'runbook', content: 'Check the proxy settings.' },
  ],
  add: async () => undefined,
};

function webSearchGateway() {
  const server = conventionServer('tools', [
    { name: 'web_search', description: 'Search the web', run: () => ({ answer: 'Rotate the SSO cache' }) },
  ]);
  return { server, gateway: new ToolGatewayClient({ baseUrl: 'http://tools.test', fetch: server.fetch }) };
}

describe('researchTicket', () => {
  it('formats retrieved notes and synthesizes from them', async () => {
    const ticket = makeTicket({ message: 'Password reset keeps failing after SSO login' });

    const result = await researchTicket(ticket, await seededStore(), quietContext());

    expect(result).toEqual({
      retrieved_notes: [
        '[playbook] Password reset issues are usually solved by clearing SSO cache and retrying after 5 minutes.',
      ],
      web_lookup_needed: true,
      synthesis: 'Password reset issues are usually solved by clearing SSO cache and retrying after 5 minutes.',
      tool_actions: [],
    });
  });

  it('falls back to the default synthesis with no notes and tools disabled', async () => {
    const ticket = makeTicket({ message: 'Zebra umbrella question' });

    const result = await researchTicket(ticket, await seededStore(), quietContext({ gateway: new ToolGatewayClient() }));

    expect(result.retrieved_notes).toEqual([]);
    expect(result.web_lookup_needed).toBe(true);
    expect(result.synthesis).toBe(DEFAULT_SYNTHESIS);
    expect(result.tool_actions).toEqual([]);
  });

  it('joins the first two notes when enough knowledge is found', async () => {
    const { server, gateway } = webSearchGateway();

    const result = await researchTicket(makeTicket(), twoHitStore, quietContext({ gateway }));

    expect(result.web_lookup_needed).toBe(false);
    expect(result.synthesis).toBe('Restart the sync agent. Check the proxy settings.');
    expect(server.requests).toHaveLength(0);
  });

  it('invokes a research tool when knowledge is thin', async () => {
    const { server, gateway } = webSearchGateway();
    const ticket = makeTicket({ ticket_id: 'T-7', message: 'Zebra umbrella question' });

    const result = await researchTicket(ticket, await seededStore(), quietContext({ gateway }));

    expect(result.retrieved_notes).toEqual(['[tool:web_search] {"answer":"Rotate the SSO cache"}']);
    expect(result.tool_actions).toEqual(['Invoked tool: web_search']);
    expect(result.synthesis).toBe('{"answer":"Rotate the SSO cache"}');
    expect(server.requests.find(r => r.path === '/tools/invoke')?.body).toEqual({
      name: 'web_search',
      arguments: { query: 'Zebra umbrella question', ticket_id: 'T-7' },
    });
  });

  it('truncates long tool results in the note', async () => {
    const server = conventionServer('tools', [{ name: 'kb_search', run: () => ({ text: 'y'.repeat(300) }) }]);
    const gateway = new ToolGatewayClient({ baseUrl: 'http://tools.test', fetch: server.fetch });

    const result = await researchTicket(makeTicket({ message: 'Zebra umbrella question' }), await seededStore(), quietContext({ gateway }));

    expect(result.retrieved_notes[0]).toBe(`[tool:kb_search] {"text":"${'y'.repeat(231)}`);
  });

  it('treats a failing knowledge store as no hits', async () => {
    const broken: KnowledgeStore = {
      search: async () => {
        throw new Error('index unavailable');
      },
      add: async () => undefined,
    };

    const result = await researchTicket(makeTicket(), broken, quietContext());

    expect(result.retrieved_notes).toEqual([]);
    expect(result.synthesis).toBe(DEFAULT_SYNTHESIS);
  });

  it('prefers an augmented synthesis truncated to 500 characters', async () => {
    const augmenter = scriptedAugmenter({ 'Research Agent': 's'.repeat(600) });

    const result = await researchTicket(makeTicket(), twoHitStore, quietContext({ augmenter }));

    expect(result.synthesis).toBe('s'.repeat(500));
  });

  it('requests the caller-specified number of knowledge hits', async () => {
    const limits: number[] = [];
    const recording: KnowledgeStore = {
      search: async (_query, limit) => {
        limits.push(limit);
        return [];
      },
      add: async () => undefined,
    };

    await researchTicket(makeTicket(), recording, quietContext());
    await researchTicket(makeTicket(), recording, quietContext(), { limit: 1 });

    expect(limits).toEqual([3, 1]);
  });
});
