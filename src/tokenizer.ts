import { Parser } from 'htmlparser2';

export type Attributes = Record<string, string>;

export type OpenToken = { type: 'open'; name: string; attrs: Attributes };
export type CloseToken = { type: 'close'; name: string };
// Void or self-contained element: never opens a scope.
export type ElementToken = { type: 'element'; name: string; attrs: Attributes };
export type TextToken = { type: 'text'; data: string };
export type CommentToken = { type: 'comment'; data: string };

export type Token = OpenToken | CloseToken | ElementToken | TextToken | CommentToken;

export const VOID_TAGS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr'
]);

/**
 * Streams `html` through htmlparser2 and re-emits it as tokens.
 *
 * htmlparser2 keeps its own element stack and reports the elements it closes
 * on our behalf as implied end tags. Those that precede an explicit end tag
 * are dropped, so the consumer sees the raw mismatch; those caused by an
 * opening tag (`<li>` after an unclosed `<li>`) or by the end of input are
 * forwarded as ordinary close tokens.
 */
export function scanHtml(html: string, emit: (token: Token) => void): void {
  let implied: string[] = [];

  const flush = () => {
    const pending = implied;
    implied = [];
    for (const name of pending) emit({ type: 'close', name });
  };

  const parser = new Parser(
    {
      onopentag(name, attribs, isImplied) {
        // stray </p> and </br> make htmlparser2 invent an opening tag
        if (isImplied) return;
        flush();
        if (VOID_TAGS.has(name)) emit({ type: 'element', name, attrs: attribs });
        else emit({ type: 'open', name, attrs: attribs });
      },
      onclosetag(name, isImplied) {
        if (VOID_TAGS.has(name)) return;
        if (isImplied) {
          implied.push(name);
          return;
        }
        implied = [];
        emit({ type: 'close', name });
      },
      ontext(data) {
        flush();
        emit({ type: 'text', data });
      },
      oncomment(data) {
        flush();
        emit({ type: 'comment', data });
      }
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true }
  );

  parser.write(html);
  parser.end();
  flush();
}

export function tokenize(html: string): Token[] {
  const tokens: Token[] = [];
  scanHtml(html, (t) => tokens.push(t));
  return tokens;
}

export function hasClass(attrs: Attributes, cls: string): boolean {
  const value = attrs['class'];
  if (!value) return false;
  return value.split(/\s+/).includes(cls);
}
