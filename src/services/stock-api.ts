import { z } from 'zod';
import { UpstreamError, errorMessage } from '../errors.js';
import type { AvailabilitySnapshot } from '../types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('StockApi');

const payloadSchema = z.object({
  data: z.array(
    z
      .object({
        _id: z.string(),
        available: z.union([z.boolean(), z.number()]),
        price: z.number().nonnegative().nullish(),
      })
      .passthrough()
  ),
});

export interface StorePreference {
  url: string;
  store: string;
}

export interface StockApiOptions {
  url: string;
  sessionUrl?: string;
  /** Sent after the session opens to pick the store region availability is read for. */
  preferences?: StorePreference;
  timeoutMs?: number;
}

interface RequestOptions {
  method?: 'GET' | 'PUT';
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export class StockApi {
  private url: string;
  private sessionUrl: string | undefined;
  private preferences: StorePreference | undefined;
  private timeoutMs: number;
  private cookie: string | null = null;

  constructor(options: StockApiOptions) {
    this.url = options.url;
    this.sessionUrl = options.sessionUrl;
    this.preferences = options.preferences;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  /**
   * One request for all of `productIds`. Products the upstream leaves out
   * are missing from the result rather than reported as out of stock.
   * Throws {@link UpstreamError}; never retries. Aborting `signal` cancels
   * the request.
   */
  async fetchAvailability(
    productIds: Set<string>,
    options: { signal?: AbortSignal } = {}
  ): Promise<AvailabilitySnapshot> {
    const availability: AvailabilitySnapshot = new Map();
    if (productIds.size === 0) return availability;
    const { signal } = options;

    const url = new URL(this.url);
    url.searchParams.set('ids', [...productIds].sort().join(','));

    const headers: Record<string, string> = { accept: 'application/json' };
    if (this.sessionUrl) {
      headers['cookie'] = await this.ensureSession(this.sessionUrl, signal);
    }

    const response = await this.request(url, { headers, signal });

    if (!response.ok) {
      if (response.status === 401 || response.status === 403) {
        this.cookie = null;
      }
      throw new UpstreamError(`Failed to fetch stock: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamError('Stock API returned a body that is not JSON', { cause: error });
    }

    const parsed = payloadSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
      throw new UpstreamError(`Malformed stock payload (${where})`, { cause: parsed.error });
    }

    for (const item of parsed.data.data) {
      if (!productIds.has(item._id)) continue;
      availability.set(item._id, {
        inStock: item.available === true || item.available === 1,
        price: item.price ?? null,
      });
    }

    const missing = productIds.size - availability.size;
    if (missing > 0) {
      log.warn(`Upstream omitted ${missing} of ${productIds.size} requested products`);
    }

    return availability;
  }

  private async request(url: URL | string, options: RequestOptions): Promise<Response> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    try {
      return await fetch(url, {
        method: options.method ?? 'GET',
        headers: options.headers,
        body: options.body,
        signal: options.signal ? AbortSignal.any([options.signal, timeout]) : timeout,
      });
    } catch (error) {
      throw new UpstreamError(`Stock API request failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async ensureSession(sessionUrl: string, signal: AbortSignal | undefined): Promise<string> {
    if (this.cookie !== null) return this.cookie;

    log.info('Refreshing stock API session cookie...');
    const response = await this.request(sessionUrl, {
      headers: { accept: 'text/html,application/json' },
      signal,
    });
    if (!response.ok) {
      throw new UpstreamError(`Failed to open stock API session: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }
    const cookies = new Map<string, string>();
    collectCookies(response, cookies);

    if (this.preferences) {
      const { url, store } = this.preferences;
      const confirm = await this.request(url, {
        method: 'PUT',
        headers: {
          accept: 'application/json',
          'content-type': 'application/json',
          cookie: formatCookies(cookies),
        },
        body: JSON.stringify({ data: { store } }),
        signal,
      });
      if (!confirm.ok) {
        throw new UpstreamError(`Failed to set stock API store: ${confirm.status} ${confirm.statusText}`, {
          status: confirm.status,
        });
      }
      collectCookies(confirm, cookies);
      log.info(`Stock API session bound to store ${store}`);
    }

    // Only cached once every step succeeded, so a failed bootstrap starts over next cycle.
    this.cookie = formatCookies(cookies);
    log.debug(`Session established with ${cookies.size} cookies`);
    return this.cookie;
  }
}

function collectCookies(response: Response, into: Map<string, string>): void {
  for (const header of response.headers.getSetCookie()) {
    const pair = header.split(';')[0]?.trim() ?? '';
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    into.set(pair.slice(0, eq), pair.slice(eq + 1));
  }
}

function formatCookies(cookies: ReadonlyMap<string, string>): string {
  return [...cookies].map(([name, value]) => `${name}=${value}`).join('; ');
}
