import { describeError } from './errors.js';
import type { ListingResult, ListingSource, Logger } from './types.js';

export type ListPagesOptions = {
  from?: string;
  to?: string;
  strict?: boolean; // rethrow listing failures
  signal?: AbortSignal;
  log?: Logger;
};

type Range = { from?: string; to?: string };

const rangeKey = (from?: string, to?: string) => `${from ?? ''}|${to ?? ''}`;

/**
 * Walks `Special:AllPages` for one namespace and yields every title once, in
 * listing order.
 *
 * A chunk index is expanded depth-first through an explicit stack of ranges;
 * a leaf listing is followed through its `from` cursor until the cursor runs
 * out or stops advancing past the current lower bound. Every range is walked
 * at most once per call, so an index that lists itself or an earlier range
 * cannot loop. A failed request ends the walk of the affected range only,
 * unless `strict` is set.
 */
export async function* listPages(
  source: ListingSource,
  namespace: number,
  opts: ListPagesOptions = {}
): AsyncGenerator<string> {
  const { strict = false, signal } = opts;
  const log = opts.log ?? ((msg: string) => console.error(msg));
  const pending: Range[] = [{ from: opts.from, to: opts.to }];
  const visited = new Set([rangeKey(opts.from, opts.to)]);

  while (pending.length) {
    const range = pending.pop();
    if (!range) break;
    let { from, to } = range;

    for (;;) {
      signal?.throwIfAborted();
      if (strict) log(`[pages] ns=${namespace} from='${from ?? ''}' to='${to ?? ''}'`);

      let listing: ListingResult;
      try {
        listing = await source.fetchListing(namespace, from, to, { signal });
      } catch (err) {
        if (strict || signal?.aborted) throw err;
        log(`[pages] error ns=${namespace} from='${from ?? ''}': ${describeError(err)}`);
        break;
      }

      if (listing.chunks.length) {
        for (let i = listing.chunks.length - 1; i >= 0; i--) {
          const chunk = listing.chunks[i];
          const key = rangeKey(chunk.from, chunk.to);
          if (visited.has(key)) {
            log(`[pages] range already visited ns=${namespace} from='${chunk.from}' to='${chunk.to}', skipping`);
            continue;
          }
          visited.add(key);
          pending.push({ from: chunk.from, to: chunk.to });
        }
        break;
      }

      for (const title of listing.pages) yield title;

      const next = listing.nextCursor;
      if (next === undefined) break;
      if (from !== undefined && next <= from) {
        if (strict) log(`[pages] cursor '${next}' does not advance past '${from}', stopping`);
        break;
      }
      from = next;
      to = undefined;
      visited.add(rangeKey(from, to));
    }
  }
}
