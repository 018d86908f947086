/**
 * SearxngClient Tests
 * Runs against an in-process HTTP stand-in for the SearXNG JSON API
 */

import { createServer, Server } from 'http';
import { ConfigService } from '@nestjs/config';
import { RiskRouterError } from '@risk-router/shared/utils';
import { SearxngClient } from './searxng.client';

describe('SearxngClient', () => {
  let server: Server;
  let baseUrl: string;
  let requests: string[];
  let status: number;
  let body: unknown;

  const configFor = (url: string | undefined) => new ConfigService({ search: { url } });

  beforeAll(async () => {
    server = createServer((req, res) => {
      requests.push(req.url ?? '');
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(body));
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('stand-in server has no port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    requests = [];
    status = 200;
    body = {
      results: [
        { title: 'Port strike', url: 'https://news.example/strike', content: 'Dock workers walk out', engine: 'bing' },
        { title: 'No url' },
        { url: 'https://trade.example/tariffs' },
      ],
    };
  });

  it('is not configured without a URL and refuses to search', async () => {
    const client = new SearxngClient(configFor(undefined));

    expect(client.isConfigured()).toBe(false);
    await expect(client.search('tariffs')).rejects.toThrow('Web search is not configured: set SEARXNG_URL');
    client.onModuleDestroy();
  });

  it('maps results and drops entries without a url', async () => {
    const client = new SearxngClient(configFor(baseUrl));

    const results = await client.search('port strike');

    expect(requests).toEqual(['/search?q=port+strike&format=json']);
    expect(results).toEqual([
      { title: 'Port strike', source: 'bing', url: 'https://news.example/strike', snippet: 'Dock workers walk out' },
      { title: 'https://trade.example/tariffs', source: 'trade.example', url: 'https://trade.example/tariffs', snippet: '' },
    ]);
    client.onModuleDestroy();
  });

  it('limits the number of results', async () => {
    const client = new SearxngClient(configFor(baseUrl));

    await expect(client.search('port strike', 1)).resolves.toHaveLength(1);
    client.onModuleDestroy();
  });

  it('serves a repeated query from the cache', async () => {
    const client = new SearxngClient(configFor(baseUrl));

    await client.search('Port Strike');
    await client.search('port strike ');

    expect(requests).toHaveLength(1);
    client.onModuleDestroy();
  });

  it('turns an HTTP error into a RiskRouterError', async () => {
    status = 502;
    body = { error: 'upstream' };
    const client = new SearxngClient(configFor(baseUrl));

    const error = await client.search('tariffs').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RiskRouterError);
    expect(error).toMatchObject({ message: 'Search API error: 502', code: 'SEARCH_ERROR', retryable: false });
    client.onModuleDestroy();
  });
});
