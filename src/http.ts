import got, { HTTPError, type Got, type Response } from 'got';
import pLimit from 'p-limit';
import http from 'node:http';
import https from 'node:https';
import type { Writable } from 'node:stream';
import { CookieJar } from 'tough-cookie';
import { extractBasePath, extractListing, extractNamespaces } from './extractors.js';
import { TransportError } from './errors.js';
import { resolveUrl, sleep } from './utils.js';
import type { ListingResult, Logger, Namespace, RequestOptions, WikiSession } from './types.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export type WikiClientOptions = {
  userAgent?: string;
  timeoutMs?: number;
  delayMs?: number;
  retries?: number;
  connections?: number;
  log?: Logger;
};

type Params = Record<string, string | number>;

export function listingParams(namespace: number, from?: string, to?: string): Params {
  const params: Params = { title: 'Special:AllPages', namespace };
  if (from) params.from = from;
  if (to) params.to = to;
  return params;
}

export function exportForm(titles: string[], currentOnly: boolean): Record<string, string> {
  const form: Record<string, string> = { title: 'Special:Export', action: 'submit', pages: titles.join('\n') };
  if (currentOnly) form.curonly = 'true';
  return form;
}

export function exportPagePath(title: string): string {
  return `/Special:Export/${encodeURIComponent(title)}`;
}

function statusOf(err: unknown): number | undefined {
  return err instanceof HTTPError ? err.response.statusCode : undefined;
}

/**
 * HTTP session against one wiki: a single cookie jar, keep-alive agents capped
 * at `connections` sockets and a limiter of the same size in front of every
 * request.
 */
export class WikiClient implements WikiSession {
  readonly baseUrl: string;
  private client: Got;
  private limit: ReturnType<typeof pLimit>;
  private agents: { http: http.Agent; https: https.Agent };
  private delayMs: number;
  private log: Logger;

  constructor(baseUrl: string, opts: WikiClientOptions = {}) {
    const { userAgent, timeoutMs, delayMs, retries, connections, log } = opts;
    const maxSockets = Math.max(1, connections ?? 4);
    this.baseUrl = baseUrl;
    this.agents = {
      http: new http.Agent({ keepAlive: true, maxSockets }),
      https: new https.Agent({ keepAlive: true, maxSockets })
    };
    this.client = got.extend({
      headers: { 'user-agent': userAgent || DEFAULT_USER_AGENT, referer: baseUrl },
      followRedirect: true,
      retry: { limit: retries ?? 2 },
      timeout: { request: timeoutMs ?? 30000 },
      cookieJar: new CookieJar(),
      agent: this.agents
    });
    this.limit = pLimit(maxSockets);
    this.delayMs = Math.max(0, delayMs ?? 0);
    this.log = log ?? ((msg) => console.error(msg));
  }

  async get(params: Params, path = '', opts: RequestOptions = {}): Promise<Buffer> {
    return this.limit(async () => {
      if (this.delayMs) await sleep(this.delayMs, opts.signal);
      const url = this.baseUrl + path;
      try {
        const res: Response<Buffer> = await this.client.get(url, {
          searchParams: params,
          responseType: 'buffer',
          signal: opts.signal
        });
        return res.body;
      } catch (err) {
        throw new TransportError(`GET ${url} ${new URLSearchParams(stringify(params))}`, err, statusOf(err));
      }
    });
  }

  async post(form: Record<string, string>, opts: RequestOptions = {}): Promise<Buffer> {
    return this.limit(async () => {
      if (this.delayMs) await sleep(this.delayMs, opts.signal);
      try {
        const res: Response<Buffer> = await this.client.post(this.baseUrl, {
          form,
          responseType: 'buffer',
          signal: opts.signal
        });
        return res.body;
      } catch (err) {
        throw new TransportError(`POST ${this.baseUrl} title=${form.title ?? ''}`, err, statusOf(err));
      }
    });
  }

  async fetchText(params: Params, opts: RequestOptions = {}): Promise<string> {
    const body = await this.get(params, '', opts);
    return body.toString('utf-8');
  }

  /**
   * Streams `Special:Redirect/file/<name>` into the sink `openSink` returns.
   * The sink is only opened once a 2xx response arrives, and is destroyed
   * together with the response stream on failure.
   */
  async downloadBinary(name: string, openSink: () => Writable, opts: RequestOptions = {}): Promise<void> {
    return this.limit(async () => {
      if (this.delayMs) await sleep(this.delayMs, opts.signal);
      const stream = this.client.stream(this.baseUrl, {
        searchParams: { title: `Special:Redirect/file/${name}` },
        signal: opts.signal
      });
      const opened: { sink?: Writable } = {};
      try {
        await new Promise<void>((resolve, reject) => {
          stream.on('error', reject);
          stream.on('response', (res: { statusCode: number }) => {
            // got turns anything else into an HTTPError on the stream
            if (res.statusCode < 200 || res.statusCode > 299) return;
            const sink = openSink();
            opened.sink = sink;
            sink.on('error', reject);
            sink.on('finish', () => resolve());
            stream.pipe(sink);
          });
        });
      } catch (err) {
        stream.destroy();
        opened.sink?.destroy();
        throw new TransportError(`download ${name}`, err, statusOf(err));
      }
    });
  }

  async fetchNamespaces(opts: RequestOptions = {}): Promise<Namespace[]> {
    const html = await this.fetchText({ title: 'Special:PrefixIndex' }, opts);
    const { namespaces, diagnostics } = extractNamespaces(html);
    for (const d of diagnostics) this.log(`[html] ${d}`);
    return namespaces;
  }

  async fetchListing(namespace: number, from?: string, to?: string, opts: RequestOptions = {}): Promise<ListingResult> {
    const html = await this.fetchText(listingParams(namespace, from, to), opts);
    const { diagnostics, ...listing } = extractListing(html);
    for (const d of diagnostics) this.log(`[html] ${d}`);
    return listing;
  }

  async exportPages(titles: string[], currentOnly: boolean, opts: RequestOptions = {}): Promise<Buffer> {
    this.log(`[export] ${titles.length} pages, curonly=${currentOnly}`);
    return this.post(exportForm(titles, currentOnly), opts);
  }

  async exportPage(title: string, opts: RequestOptions = {}): Promise<Buffer> {
    this.log(`[export] single page: ${title}`);
    return this.get({}, exportPagePath(title), opts);
  }

  close(): void {
    this.limit.clearQueue();
    this.agents.http.destroy();
    this.agents.https.destroy();
  }
}

function stringify(params: Params): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(params)) out[k] = String(v);
  return out;
}

export type DiscoverOptions = {
  userAgent?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  log?: Logger;
};

/**
 * Fetches the seed page and returns the absolute URL of the wiki's script
 * (e.g. `https://example.org/w/index.php`).
 */
export async function discoverBaseUrl(seedUrl: string, opts: DiscoverOptions = {}): Promise<string> {
  const log = opts.log ?? ((msg: string) => console.error(msg));
  let res: Response<string>;
  try {
    res = await got.get(seedUrl, {
      headers: { 'user-agent': opts.userAgent || DEFAULT_USER_AGENT },
      timeout: { request: opts.timeoutMs ?? 30000 },
      responseType: 'text',
      signal: opts.signal
    });
  } catch (err) {
    throw new TransportError(`GET ${seedUrl}`, err, statusOf(err));
  }
  const { basePath, diagnostics } = extractBasePath(res.body);
  for (const d of diagnostics) log(`[discover] ${d}`);
  return resolveUrl(res.url, basePath);
}
