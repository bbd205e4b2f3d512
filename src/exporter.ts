import pLimit from 'p-limit';
import path from 'node:path';
import { WikiClient, discoverBaseUrl } from './http.js';
import { listPages } from './pagination.js';
import { createFileSink, ensureDir, planDownload, removeFile, type SinkFactory } from './storage.js';
import { describeError } from './errors.js';
import type { CrawlSummary, ExportConfig, Logger, WikiSession } from './types.js';

export type OutputSink = {
  write(chunk: string): unknown;
};

export type ExportOptions = {
  signal?: AbortSignal;
  log?: Logger;
  openSink?: SinkFactory;
};

type JobOutcome = { ok: true; payload?: Buffer } | { ok: false; label: string; error: unknown };

/**
 * Exports every page of the wiki behind `session`.
 *
 * Titles are streamed from the listing walk into batches; each full batch and
 * every media download becomes a job on a pool of `connections` slots, so
 * listing continues while exports run. Export payloads are written to `out`
 * in the order their batches were formed, once all jobs have settled.
 */
export async function exportWiki(
  session: WikiSession,
  config: ExportConfig,
  out: OutputSink,
  opts: ExportOptions = {}
): Promise<CrawlSummary> {
  const { signal } = opts;
  const log = opts.log ?? ((msg: string) => console.error(msg));
  const openSink = opts.openSink ?? createFileSink;
  const currentOnly = !config.history;
  const pool = pLimit(Math.max(1, config.connections));
  const jobs: Promise<JobOutcome>[] = [];
  const summary: CrawlSummary = {
    namespaces: 0,
    pages: 0,
    batches: 0,
    downloads: 0,
    skippedDownloads: 0,
    failures: 0
  };

  const schedule = (label: string, run: () => Promise<Buffer | undefined>) => {
    jobs.push(
      pool(run).then(
        (payload): JobOutcome => ({ ok: true, payload }),
        (error: unknown): JobOutcome => ({ ok: false, label, error })
      )
    );
  };

  const flush = (batch: string[]) => {
    summary.batches++;
    if (config.batchSize === 1) {
      const title = batch[0];
      schedule(`export ${title}`, () => session.exportPage(title, { signal }));
    } else {
      schedule(`export ${batch.length} pages from ${batch[0]}`, () =>
        session.exportPages(batch, currentOnly, { signal })
      );
    }
  };

  if (config.saveDir) ensureDir(config.saveDir);

  let namespaces = await session.fetchNamespaces({ signal });
  if (config.namespaces?.length) {
    const wanted = new Set(config.namespaces);
    namespaces = namespaces.filter((ns) => wanted.has(ns.id));
  }
  summary.namespaces = namespaces.length;
  log(`[export] namespaces: ${namespaces.map((ns) => `${ns.id}=${ns.name}`).join(', ')}`);

  let batch: string[] = [];
  try {
    for (const ns of namespaces) {
      for await (const title of listPages(session, ns.id, { strict: config.strict, signal, log })) {
        summary.pages++;
        if (config.saveDir) {
          const plan = planDownload(title, config.saveDir);
          if (plan.kind === 'job') {
            const { destinationPath } = plan.job;
            summary.downloads++;
            schedule(`download ${title}`, async () => {
              let opened = false;
              const open = () => {
                opened = true;
                return openSink(destinationPath);
              };
              try {
                await session.downloadBinary(path.basename(destinationPath), open, { signal });
              } catch (err) {
                // no partial files under saveDir
                if (opened) await removeFile(destinationPath);
                throw err;
              }
              return undefined;
            });
          } else if (plan.kind === 'unsafe') {
            summary.skippedDownloads++;
            log(`[download] will not download file names with slashes: ${plan.name}`);
          }
        }

        batch.push(title);
        if (batch.length >= config.batchSize) {
          flush(batch);
          batch = [];
        }
      }
    }
  } catch (err) {
    // drop queued jobs; those already running settle on their own
    pool.clearQueue();
    throw err;
  }

  // the remainder always goes through the bulk endpoint, even a single title
  if (batch.length) {
    const rest = batch;
    summary.batches++;
    schedule(`export ${rest.length} pages from ${rest[0]}`, () => session.exportPages(rest, currentOnly, { signal }));
  }

  const outcomes = await Promise.all(jobs);
  let firstError: unknown;
  for (const outcome of outcomes) {
    if (outcome.ok) {
      if (outcome.payload?.length) out.write(outcome.payload.toString('utf-8'));
      continue;
    }
    summary.failures++;
    firstError ??= outcome.error;
    log(`[export] failed: ${outcome.label}: ${describeError(outcome.error)}`);
  }
  if (firstError !== undefined && (config.strict || signal?.aborted)) throw firstError;
  return summary;
}

/**
 * Discovers the wiki behind `seedUrl` and exports it to `out`.
 */
export async function exportSite(
  seedUrl: string,
  config: ExportConfig,
  out: OutputSink,
  opts: ExportOptions = {}
): Promise<CrawlSummary> {
  const log = opts.log ?? ((msg: string) => console.error(msg));
  const baseUrl = await discoverBaseUrl(seedUrl, {
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    signal: opts.signal,
    log
  });
  log(`[discover] using base url ${baseUrl}`);

  const client = new WikiClient(baseUrl, {
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    delayMs: config.delayMs,
    retries: config.retries,
    connections: config.connections,
    log
  });
  try {
    return await exportWiki(client, config, out, opts);
  } finally {
    client.close();
  }
}
