import { scanHtml, VOID_TAGS, type ElementToken, type OpenToken, type Token } from './tokenizer.js';

/**
 * Stack of open elements plus named capture regions.
 *
 * A region is anchored at the stack depth right after the element that opened
 * it was pushed, and stays active until the stack drops below that depth.
 */
export class ScopeTracker<K extends string> {
  private stack: string[] = [];
  private regions = new Map<K, number>();
  readonly diagnostics: string[] = [];

  get depth(): number {
    return this.stack.length;
  }

  get openTags(): readonly string[] {
    return this.stack;
  }

  push(tag: string): void {
    if (VOID_TAGS.has(tag)) return;
    this.stack.push(tag);
  }

  /** Anchors `kind` at the current depth unless it is already active. */
  openRegion(kind: K): boolean {
    if (this.regions.has(kind)) return false;
    this.regions.set(kind, this.stack.length);
    return true;
  }

  inside(kind: K): boolean {
    return this.regions.has(kind);
  }

  /** Applies an end tag and returns the regions it closed, innermost first. */
  pop(tag: string): K[] {
    if (VOID_TAGS.has(tag)) return [];

    if (this.stack.length && this.stack[this.stack.length - 1] === tag) {
      this.stack.pop();
    } else {
      const idx = this.stack.lastIndexOf(tag);
      if (idx < 0) {
        this.diagnostics.push(`no start tag for: </${tag}> in [${this.stack.join(', ')}]`);
        return [];
      }
      this.diagnostics.push(
        `missing end tag for: [${this.stack.slice(idx + 1).join(', ')}] closing <${tag}>`
      );
      this.stack.length = idx;
    }

    const closed: [K, number][] = [];
    for (const [kind, openDepth] of this.regions) {
      if (openDepth > this.stack.length) closed.push([kind, openDepth]);
    }
    closed.sort((a, b) => b[1] - a[1]);
    for (const [kind] of closed) this.regions.delete(kind);
    return closed.map(([kind]) => kind);
  }
}

/**
 * Base class for single-pass extractors. A subclass registers regions from
 * `onOpen`, reacts to text and region ends, and builds its result at the end
 * of input. Instances are single-use; `run` on a fresh instance per document.
 */
export abstract class ScopedExtractor<K extends string, R> {
  protected readonly scope = new ScopeTracker<K>();
  private used = false;

  run(html: string): R {
    if (this.used) throw new Error('extractor instances are single-use');
    this.used = true;
    scanHtml(html, (token) => this.accept(token));
    return this.result();
  }

  get diagnostics(): string[] {
    return this.scope.diagnostics;
  }

  protected abstract onOpen(tag: OpenToken | ElementToken): void;

  protected onText(_data: string): void {}

  protected onRegionClose(_kind: K): void {}

  protected abstract result(): R;

  private accept(token: Token): void {
    switch (token.type) {
      case 'open':
        this.scope.push(token.name);
        this.onOpen(token);
        break;
      case 'element':
        this.onOpen(token);
        break;
      case 'text':
        this.onText(token.data);
        break;
      case 'close':
        for (const kind of this.scope.pop(token.name)) this.onRegionClose(kind);
        break;
      case 'comment':
        break;
    }
  }
}
