import { runInNewContext } from 'vm';
import { afterEach, describe, expect, it } from 'vitest';
import { createDashboardApp } from '../dashboard/proxy';
import { listen } from './helpers';
import type { RunningServer } from './helpers';

interface Forwarded {
  url: string;
  method: string | undefined;
  apiKey: string | null;
  body: string | null;
}

let server: RunningServer | undefined;

afterEach(async () => {
  await server?.close();
  server = undefined;
});

function startDashboard(respond: () => Response) {
  const calls: Forwarded[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      apiKey: new Headers(init?.headers).get('x-api-key'),
      body: typeof init?.body === 'string' ? init.body : null,
    });
    return respond();
  };
  return { calls, app: createDashboardApp({ apiBase: 'http://api.test', apiKey: 'test-key', fetchImpl }) };
}

describe('dashboard proxy', () => {
  it('forwards requests with the API key injected', async () => {
    const { calls, app } = startDashboard(
      () => new Response(JSON.stringify({ cpa: 12.5 }), { status: 200, headers: { 'content-type': 'application/json' } })
    );
    server = await listen(app);

    const res = await fetch(`${server.baseUrl}/api/v1/pricing/quote`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ sms: 40 }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ cpa: 12.5 });
    expect(calls).toEqual([
      {
        url: 'http://api.test/api/v1/pricing/quote',
        method: 'POST',
        apiKey: 'test-key',
        body: '{"sms":40}',
      },
    ]);
  });

  it('passes CSV downloads through with their headers', async () => {
    const { app } = startDashboard(
      () =>
        new Response('Category,Item,Value\n', {
          status: 200,
          headers: {
            'content-type': 'text/csv; charset=utf-8',
            'content-disposition': 'attachment; filename="invoice_20260305.csv"',
          },
        })
    );
    server = await listen(app);

    const res = await fetch(`${server.baseUrl}/api/v1/proposals/VX1/invoice.csv`);
    expect(res.headers.get('content-disposition')).toBe('attachment; filename="invoice_20260305.csv"');
    expect(res.headers.get('content-type')).toContain('text/csv');
    expect(await res.text()).toBe('Category,Item,Value\n');
  });

  it('keeps upstream error statuses', async () => {
    const { app } = startDashboard(
      () => new Response(JSON.stringify({ error: 'Proposal not found' }), { status: 404 })
    );
    server = await listen(app);

    const res = await fetch(`${server.baseUrl}/api/v1/proposals/VX1`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Proposal not found' });
  });

  it('answers 502 when the API is unreachable', async () => {
    const { app } = startDashboard(() => {
      throw new Error('connect ECONNREFUSED');
    });
    server = await listen(app);

    const res = await fetch(`${server.baseUrl}/api/v1/pricing/channels`);
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'API proxy error', detail: 'Error: connect ECONNREFUSED' });
  });
});

class FakeElement {
  value = '0';
  textContent = '';
  className = '';
  children: unknown[] = [];
  listeners = new Map<string, () => void>();

  addEventListener(type: string, fn: () => void) {
    this.listeners.set(type, fn);
  }

  replaceChildren(...nodes: unknown[]) {
    this.children = nodes;
  }

  appendChild(node: unknown) {
    this.children.push(node);
  }
}

interface FakeResponse {
  ok: boolean;
  json: () => Promise<unknown>;
}

function quoteBody(marketingCost: number) {
  return { marketingCost, approvals: 100, cpa: 1, breakdown: [], insights: [], reach: { status: 'full' }, warnings: [] };
}

const settle = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('dashboard page', () => {
  it('renders only the latest quote when responses arrive out of order', async () => {
    const { app } = startDashboard(() => new Response('{}'));
    server = await listen(app);
    const html = await (await fetch(`${server.baseUrl}/`)).text();
    const script = /<script>([\s\S]*?)<\/script>/.exec(html);
    if (!script) throw new Error('page has no inline script');

    const elements = new Map<string, FakeElement>();
    const document = {
      getElementById(id: string): FakeElement {
        const existing = elements.get(id);
        if (existing) return existing;
        const created = new FakeElement();
        elements.set(id, created);
        return created;
      },
      createElement: () => new FakeElement(),
    };

    const pendingQuotes: ((body: unknown) => void)[] = [];
    const pageFetch = (url: string): Promise<FakeResponse> => {
      if (url === '/api/v1/pricing/channels') {
        return Promise.resolve({ ok: false, json: async () => ({}) });
      }
      return new Promise((resolve) => {
        pendingQuotes.push((body) => resolve({ ok: true, json: async () => body }));
      });
    };

    runInNewContext(script[1], { document, fetch: pageFetch, URL });
    const onInput = document.getElementById('sms').listeners.get('input');
    if (!onInput) throw new Error('no input listener on the SMS slider');
    onInput();
    expect(pendingQuotes).toHaveLength(2);

    pendingQuotes[1](quoteBody(2000));
    await settle();
    pendingQuotes[0](quoteBody(1000));
    await settle();

    expect(document.getElementById('marketingCost').textContent).toBe('RM 2,000.00');
  });
});
