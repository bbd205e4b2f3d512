import { ScopedExtractor } from './scope.js';
import { hasClass, type ElementToken, type OpenToken } from './tokenizer.js';
import { DiscoveryError } from './errors.js';
import type { ListingResult, Namespace, PageRangeChunk } from './types.js';

// MediaWiki chrome whose links always point at the script path.
const BASE_LINK_IDS: ReadonlySet<string> = new Set([
  'pt-login',
  'ca-viewsource',
  't-print',
  'ca-history',
  't-permalink'
]);

export type BasePathResult = {
  basePath: string;
  candidates: Map<string, number>;
  diagnostics: string[];
};

export type NamespaceResult = {
  namespaces: Namespace[];
  diagnostics: string[];
};

export type ListingExtract = ListingResult & { diagnostics: string[] };

function queryOf(href: string): URLSearchParams {
  try {
    return new URL(href, 'http://wiki.invalid/').searchParams;
  } catch {
    return new URLSearchParams();
  }
}

function stripQuery(href: string): string {
  const q = href.indexOf('?');
  return q < 0 ? href : href.slice(0, q);
}

class BasePathExtractor extends ScopedExtractor<'chrome', Map<string, number>> {
  private counts = new Map<string, number>();

  protected onOpen(tag: OpenToken | ElementToken): void {
    const id = tag.attrs['id'];
    if (tag.name === 'li' && id && BASE_LINK_IDS.has(id)) {
      this.scope.openRegion('chrome');
    } else if (tag.name === 'a' && (this.scope.inside('chrome') || (id && BASE_LINK_IDS.has(id)))) {
      const href = tag.attrs['href'];
      if (!href) return;
      const path = stripQuery(href);
      this.counts.set(path, (this.counts.get(path) ?? 0) + 1);
    }
  }

  protected result(): Map<string, number> {
    return this.counts;
  }
}

/**
 * Finds the wiki's script path (e.g. `/w/index.php`) by counting the targets
 * of well-known page-chrome links. Throws DiscoveryError when there are none.
 */
export function extractBasePath(html: string): BasePathResult {
  const extractor = new BasePathExtractor();
  const candidates = extractor.run(html);
  const diagnostics = [...extractor.diagnostics];

  let basePath: string | undefined;
  let best = 0;
  for (const [path, count] of candidates) {
    if (count > best) {
      basePath = path;
      best = count;
    }
  }
  if (basePath === undefined) throw new DiscoveryError('no base path found');
  if (candidates.size > 1) {
    const list = [...candidates].map(([p, n]) => `${p} (${n})`).join(', ');
    diagnostics.push(`found multiple base paths: ${list}`);
  }
  return { basePath, candidates, diagnostics };
}

type NamespaceRegion = 'select' | 'option';

class NamespaceExtractor extends ScopedExtractor<NamespaceRegion, Namespace[]> {
  private namespaces: Namespace[] = [];
  private text = '';
  private value: number | undefined;

  protected onOpen(tag: OpenToken | ElementToken): void {
    if (tag.name === 'select' && tag.attrs['id'] === 'namespace') {
      this.scope.openRegion('select');
    } else if (tag.name === 'option' && this.scope.inside('select')) {
      if (!this.scope.openRegion('option')) return;
      this.text = '';
      const raw = tag.attrs['value'] ?? '';
      this.value = /^-?\d+$/.test(raw.trim()) ? parseInt(raw, 10) : undefined;
      if (this.value === undefined) this.diagnostics.push(`namespace option without numeric value: "${raw}"`);
    }
  }

  protected onText(data: string): void {
    if (this.scope.inside('option')) this.text += data;
  }

  protected onRegionClose(kind: NamespaceRegion): void {
    if (kind !== 'option') return;
    if (this.value !== undefined) this.namespaces.push({ id: this.value, name: this.text });
    this.value = undefined;
  }

  protected result(): Namespace[] {
    return this.namespaces;
  }
}

/** Reads the `select#namespace` drop-down (ids and display names, in order). */
export function extractNamespaces(html: string): NamespaceResult {
  const extractor = new NamespaceExtractor();
  const namespaces = extractor.run(html);
  return { namespaces, diagnostics: extractor.diagnostics };
}

type ListingRegion = 'chunks' | 'table' | 'list' | 'nav';

class ListingExtractor extends ScopedExtractor<ListingRegion, ListingResult> {
  private chunks: PageRangeChunk[] = [];
  private pages: string[] = [];
  private nextCursor: string | undefined;

  protected onOpen(tag: OpenToken | ElementToken): void {
    const { name, attrs } = tag;
    if (name === 'table' && hasClass(attrs, 'allpageslist')) {
      this.scope.openRegion('chunks');
    } else if (name === 'table' && hasClass(attrs, 'mw-allpages-table-chunk')) {
      this.scope.openRegion('table');
    } else if (name === 'ul' && hasClass(attrs, 'mw-allpages-chunk')) {
      this.scope.openRegion('list');
    } else if (name === 'div' && hasClass(attrs, 'mw-allpages-nav')) {
      this.scope.openRegion('nav');
    } else if (name === 'a') {
      this.onAnchor(attrs);
    }
  }

  private onAnchor(attrs: Record<string, string>): void {
    if (this.scope.inside('chunks')) {
      const qs = queryOf(attrs['href'] ?? '');
      const from = qs.get('from');
      const to = qs.get('to');
      if (from === null || to === null) {
        this.diagnostics.push(`chunk link without from/to: ${attrs['href'] ?? '(no href)'}`);
        return;
      }
      const last = this.chunks[this.chunks.length - 1];
      if (last && last.from === from && last.to === to) return;
      this.chunks.push({ from, to });
    } else if (this.scope.inside('table') || this.scope.inside('list')) {
      const title = attrs['title'];
      if (title) this.pages.push(title);
    } else if (this.scope.inside('nav') && this.nextCursor === undefined) {
      const from = queryOf(attrs['href'] ?? '').get('from');
      if (from !== null) this.nextCursor = from;
    }
  }

  protected result(): ListingResult {
    return { chunks: this.chunks, pages: this.pages, nextCursor: this.nextCursor };
  }
}

/** Parses one `Special:AllPages` response. */
export function extractListing(html: string): ListingExtract {
  const extractor = new ListingExtractor();
  const listing = extractor.run(html);
  return { ...listing, diagnostics: extractor.diagnostics };
}
