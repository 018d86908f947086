import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { PipelineLimits, SearchResult } from '@risk-router/shared/types';
import { CacheManager, RiskRouterError } from '@risk-router/shared/utils';

interface SearxngResult {
  title?: string;
  url?: string;
  content?: string;
  engine?: string;
}

interface SearxngResponse {
  results?: SearxngResult[];
}

/**
 * Web search through a SearXNG instance (JSON API), cached per query
 */
@Injectable()
export class SearxngClient implements OnModuleDestroy {
  private readonly logger = new Logger(SearxngClient.name);
  private readonly client: AxiosInstance | null;
  private readonly cache = new CacheManager({ stdTTL: 900, maxKeys: 500 });

  constructor(configService: ConfigService) {
    const baseURL = configService.get<string>('search.url');

    this.client = baseURL
      ? axios.create({
          baseURL,
          timeout: 15000,
          headers: { Accept: 'application/json' },
        })
      : null;

    this.client?.interceptors.response.use(
      (response) => response,
      (error) => {
        if (axios.isAxiosError(error) && error.response) {
          throw new RiskRouterError(`Search API error: ${error.response.status}`, 'SEARCH_ERROR', {
            retryable: error.response.status === 429,
          });
        }
        throw error;
      }
    );
  }

  onModuleDestroy(): void {
    this.cache.close();
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  async search(query: string, maxResults: number = PipelineLimits.SEARCH_MAX_RESULTS): Promise<SearchResult[]> {
    if (!this.client) {
      throw new RiskRouterError('Web search is not configured: set SEARXNG_URL', 'SEARCH_NOT_CONFIGURED');
    }

    const cacheKey = this.cache.generateKey('search', query, { max: maxResults });
    const cached = this.cache.get<SearchResult[]>(cacheKey);
    if (cached) {
      return cached;
    }

    const response = await this.client.get<SearxngResponse>('/search', {
      params: { q: query, format: 'json' },
    });

    const results = (response.data.results ?? [])
      .filter((result) => result.url)
      .slice(0, maxResults)
      .map((result) => toSearchResult(result));

    this.logger.debug(`Search "${query}" returned ${results.length} results`);
    this.cache.set(cacheKey, results, 'search');
    return results;
  }
}

function toSearchResult(result: SearxngResult): SearchResult {
  const url = result.url ?? '';
  return {
    title: result.title ?? url,
    source: result.engine ?? hostnameOf(url),
    url,
    snippet: result.content ?? '',
  };
}

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return 'unknown';
  }
}
