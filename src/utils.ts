export const FILE_PREFIX = 'File:';

// Read/write granularity for binary downloads.
export const CHUNK_SIZE = 0x10000;

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) return reject(signal.reason);
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** `File:Foo.png` -> `Foo.png`; undefined for titles outside the File namespace. */
export function fileLocalName(title: string): string | undefined {
  if (!title.startsWith(FILE_PREFIX)) return undefined;
  return title.slice(FILE_PREFIX.length);
}

export function hasPathSeparator(name: string): boolean {
  return /[\/\\]/.test(name);
}

export function parseIntList(input: string): number[] {
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => parseInt(s, 10))
    .filter((n) => Number.isFinite(n));
}

export function resolveUrl(baseUrl: string, href: string): string {
  return new URL(href, baseUrl).toString();
}
