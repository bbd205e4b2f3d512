import type { Writable } from 'node:stream';

export type Namespace = {
  id: number;
  name: string;
};

export type PageRangeChunk = {
  from: string;
  to: string;
};

// Either a chunk index (chunks non-empty) or a leaf list of pages.
export type ListingResult = {
  chunks: PageRangeChunk[];
  pages: string[];
  nextCursor?: string;
};

export type DownloadJob = {
  title: string;
  destinationPath: string;
};

export type Logger = (msg: string) => void;

export type RequestOptions = {
  signal?: AbortSignal;
};

/** Anything that can serve `Special:AllPages` listings. */
export interface ListingSource {
  fetchListing(namespace: number, from?: string, to?: string, opts?: RequestOptions): Promise<ListingResult>;
}

/** The operations the exporter needs from a wiki. `WikiClient` is the HTTP one. */
export interface WikiSession extends ListingSource {
  fetchNamespaces(opts?: RequestOptions): Promise<Namespace[]>;
  exportPages(titles: string[], currentOnly: boolean, opts?: RequestOptions): Promise<Buffer>;
  exportPage(title: string, opts?: RequestOptions): Promise<Buffer>;
  downloadBinary(name: string, openSink: () => Writable, opts?: RequestOptions): Promise<void>;
}

export type ExportConfig = {
  history: boolean; // full history instead of current revision only
  saveDir?: string; // download File: media here
  connections: number; // max simultaneous requests and jobs
  batchSize: number; // titles per export request
  namespaces?: number[]; // restrict the crawl to these ids
  strict: boolean; // rethrow transport errors instead of skipping
  timeoutMs: number;
  delayMs: number;
  retries: number;
  userAgent?: string;
};

export type CrawlSummary = {
  namespaces: number;
  pages: number;
  batches: number;
  downloads: number;
  skippedDownloads: number;
  failures: number;
};
