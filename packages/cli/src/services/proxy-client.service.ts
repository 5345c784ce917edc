/**
 * Proxy Sync Client
 * Delivers the routing table to the environment's proxy over its JSON RPC API
 */

import { setTimeout as sleep } from 'timers/promises';
import { siteHostnames, type SiteConfig } from '@berth/config';
import { RoutingSyncError } from '../errors';
import { SITE_UPSTREAM_PORT } from '../generators/docker';

export const DEFAULT_PROXY_URL = 'http://127.0.0.1:5000';

export interface RouteEntry {
  hostname: string;
  /** Primary hostname of the site serving this route */
  site: string;
  port: number;
}

export type RoutingTable = RouteEntry[];

export interface ProxyClient {
  /** Liveness check; rejects until the proxy is ready */
  ping(signal?: AbortSignal): Promise<void>;
  /** Replace the proxy's whole routing state with this table */
  apply(table: RoutingTable, signal?: AbortSignal): Promise<void>;
}

/**
 * One route per hostname and alias of every site
 */
export function buildRoutingTable(sites: SiteConfig[], port = SITE_UPSTREAM_PORT): RoutingTable {
  return sites.flatMap((site) => siteHostnames(site).map((hostname) => ({ hostname, site: site.hostname, port })));
}

type Fetch = typeof fetch;

export class HttpProxyClient implements ProxyClient {
  constructor(
    private readonly baseUrl: string = process.env.BERTH_PROXY_URL || DEFAULT_PROXY_URL,
    private readonly fetchImpl: Fetch = fetch
  ) {}

  private async call(path: string, body: unknown, signal?: AbortSignal): Promise<void> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`${path} returned ${response.status}${text ? `: ${text}` : ''}`);
    }
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await this.call('/v1/ping', {}, signal);
  }

  async apply(table: RoutingTable, signal?: AbortSignal): Promise<void> {
    await this.call('/v1/apply', { routes: table }, signal);
  }
}

// =============================================================================
// Readiness and sync
// =============================================================================

export interface ReadinessOptions {
  initialDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Clock and timer, replaceable in tests */
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await sleep(ms, undefined, { signal });
};

/**
 * Ping the proxy until it answers, backing off exponentially up to
 * maxDelayMs between attempts, and give up at the deadline or on abort.
 */
export async function waitForProxy(client: ProxyClient, options: ReadinessOptions = {}): Promise<number> {
  const {
    initialDelayMs = 100,
    maxDelayMs = 2000,
    timeoutMs = 30_000,
    signal,
    now = Date.now,
    sleep: wait = defaultSleep,
  } = options;

  const deadline = now() + timeoutMs;
  let delay = initialDelayMs;
  let attempts = 0;
  let lastError: unknown;

  for (;;) {
    if (signal?.aborted) {
      throw new RoutingSyncError('cancelled while waiting for the proxy', { entity: 'proxy', cause: lastError });
    }

    attempts++;
    try {
      await client.ping(signal);
      return attempts;
    } catch (err) {
      lastError = err;
    }

    const remaining = deadline - now();
    if (remaining <= 0) {
      throw new RoutingSyncError(`proxy did not become ready within ${timeoutMs}ms`, {
        entity: 'proxy',
        cause: lastError,
      });
    }

    try {
      await wait(Math.min(delay, remaining), signal);
    } catch (err) {
      throw new RoutingSyncError('cancelled while waiting for the proxy', { entity: 'proxy', cause: err });
    }
    delay = Math.min(delay * 2, maxDelayMs);
  }
}

/**
 * Wait for the proxy, then send it the full routing table in one call
 */
export async function syncRoutes(
  client: ProxyClient,
  table: RoutingTable,
  options: ReadinessOptions = {}
): Promise<void> {
  await waitForProxy(client, options);

  try {
    await client.apply(table, options.signal);
  } catch (err) {
    throw new RoutingSyncError('unable to configure the proxy', { entity: 'proxy', cause: err });
  }
}
