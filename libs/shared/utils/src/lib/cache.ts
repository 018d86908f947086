import { Logger } from '@nestjs/common';
import NodeCache = require('node-cache');

interface CacheConfig {
  stdTTL: number;
  checkperiod: number;
  useClones: boolean;
  maxKeys?: number;
}

export class CacheManager {
  private readonly logger = new Logger(CacheManager.name);
  private cache: NodeCache;
  private defaultTTL: number;
  private cacheTTLs: Map<string, number>;

  constructor(config?: Partial<CacheConfig>) {
    this.defaultTTL = config?.stdTTL || 300;

    this.cache = new NodeCache({
      stdTTL: this.defaultTTL,
      checkperiod: config?.checkperiod || 60,
      useClones: config?.useClones ?? true,
      maxKeys: config?.maxKeys || 1000,
    });

    this.cacheTTLs = new Map([['search', 900]]);

    this.cache.on('expired', (key: string) => {
      this.logger.debug(`Cache expired for key: ${key}`);
    });
  }

  generateKey(namespace: string, value: string, additionalParams?: Record<string, string | number>): string {
    const baseKey = `${namespace}:${value.trim().toLowerCase()}`;

    if (additionalParams && Object.keys(additionalParams).length > 0) {
      const paramString = Object.entries(additionalParams)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, param]) => `${key}:${param}`)
        .join(':');
      return `${baseKey}:${paramString}`;
    }

    return baseKey;
  }

  get<T>(key: string): T | null {
    const value = this.cache.get<T>(key);
    if (value !== undefined) {
      this.logger.debug(`Cache hit for key: ${key}`);
      return value;
    }
    return null;
  }

  set<T>(key: string, value: T, dataType?: string): boolean {
    const ttl = dataType ? this.cacheTTLs.get(dataType) || this.defaultTTL : this.defaultTTL;
    try {
      return this.cache.set(key, value, ttl);
    } catch (error) {
      // maxKeys reached: serve uncached rather than fail the caller
      this.logger.warn(`Error setting cache for key ${key}: ${error instanceof Error ? error.message : error}`);
      return false;
    }
  }

  close(): void {
    this.cache.close();
  }
}
