import { fetch as undiciFetch, ProxyAgent } from 'undici';
import type { Dispatcher } from 'undici';
import { ACCEPT_HTML, ACCEPT_LANGUAGE, REQUEST_TIMEOUT_MS, USER_AGENTS } from '../config.js';
import type { FetchResult } from '../types.js';
import type { Logger } from './logger.js';

export interface FetchInit {
  method: 'GET';
  redirect: 'follow';
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface FetchResponse {
  status: number;
  url: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

export interface HttpClientOptions {
  timeoutMs?: number;
  proxies?: string[];
  userAgents?: readonly string[];
  random?: () => number;
  fetchImpl?: FetchFn;
  logger?: Logger;
}

/** Anything that can fetch a page; the scraper only needs this much of {@link HttpClient}. */
export interface PageFetcher {
  get(url: string, headers?: Record<string, string>): Promise<FetchResult | null>;
}

const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);

function mergeHeaders(...headersList: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const headers of headersList) {
    if (!headers) {
      continue;
    }
    for (const [key, value] of Object.entries(headers)) {
      merged[key] = value;
    }
  }
  return merged;
}

export class HttpClient implements PageFetcher {
  private readonly timeoutMs: number;
  private readonly proxies: string[];
  private readonly userAgents: readonly string[];
  private readonly random: () => number;
  private readonly fetchImpl: FetchFn;
  private readonly logger?: Logger;
  private readonly agents = new Map<string, ProxyAgent>();

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.proxies = options.proxies ?? [];
    this.userAgents = options.userAgents ?? USER_AGENTS;
    this.random = options.random ?? Math.random;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.logger = options.logger;
  }

  /**
   * GET with the browser-like header set. With proxies configured each one is
   * tried in order until one answers 200, then the request is made directly.
   * Network failures resolve to `null`.
   */
  async get(url: string, headers?: Record<string, string>): Promise<FetchResult | null> {
    const requestHeaders = mergeHeaders(
      {
        'user-agent': this.pickUserAgent(),
        'accept-language': ACCEPT_LANGUAGE,
        accept: ACCEPT_HTML,
      },
      headers,
    );

    if (this.proxies.length === 0) {
      try {
        return await this.performFetch(url, requestHeaders);
      } catch (error) {
        await this.logger?.error(`Request failed for ${url}: ${String(error)}`);
        return null;
      }
    }

    for (const proxy of this.proxies) {
      try {
        const result = await this.performFetch(url, requestHeaders, this.agentFor(proxy));
        if (result.status === 200) {
          await this.logger?.info(`Request succeeded through proxy ${proxy}`);
          return result;
        }
        await this.logger?.warn(`Proxy ${proxy} answered ${result.status}`);
      } catch (error) {
        await this.logger?.warn(`Proxy ${proxy} failed: ${String(error)}`);
      }
    }

    await this.logger?.warn('All proxies failed, retrying without proxy');
    try {
      return await this.performFetch(url, requestHeaders);
    } catch (error) {
      await this.logger?.error(`Request without proxy failed for ${url}: ${String(error)}`);
      return null;
    }
  }

  async close(): Promise<void> {
    const agents = [...this.agents.values()];
    this.agents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }

  private pickUserAgent(): string {
    const index = Math.min(this.userAgents.length - 1, Math.floor(this.random() * this.userAgents.length));
    return this.userAgents[index] ?? USER_AGENTS[0];
  }

  private agentFor(proxy: string): ProxyAgent {
    const existing = this.agents.get(proxy);
    if (existing) {
      return existing;
    }
    const agent = new ProxyAgent(proxy);
    this.agents.set(proxy, agent);
    return agent;
  }

  private async performFetch(
    url: string,
    headers: Record<string, string>,
    dispatcher?: Dispatcher,
  ): Promise<FetchResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        redirect: 'follow',
        headers,
        signal: controller.signal,
        dispatcher,
      });

      return {
        status: response.status,
        url: response.url || url,
        body: await response.text(),
        contentType: response.headers.get('content-type') ?? '',
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}
