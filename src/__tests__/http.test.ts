import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import http from 'node:http';
import { Writable } from 'node:stream';
import { discoverBaseUrl, exportForm, exportPagePath, listingParams, WikiClient } from '../http.js';
import { TransportError } from '../errors.js';

describe('request building', () => {
  it('builds AllPages parameters', () => {
    expect(listingParams(0)).toEqual({ title: 'Special:AllPages', namespace: 0 });
    expect(listingParams(6, 'A', 'M')).toEqual({ title: 'Special:AllPages', namespace: 6, from: 'A', to: 'M' });
  });

  it('builds the bulk export form', () => {
    expect(exportForm(['A', 'B'], true)).toEqual({
      title: 'Special:Export',
      action: 'submit',
      pages: 'A\nB',
      curonly: 'true'
    });
    expect(exportForm(['A'], false)).toEqual({ title: 'Special:Export', action: 'submit', pages: 'A' });
  });

  it('encodes the whole title into the single-page export path', () => {
    expect(exportPagePath('Help:A/B c')).toBe('/Special:Export/Help%3AA%2FB%20c');
  });
});

type Seen = {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
};

const MAIN_PAGE =
  '<ul><li id="t-permalink"><a href="/w/index.php?title=Main_Page&amp;oldid=1">Permanent link</a></li></ul>';
const PREFIX_INDEX =
  '<select id="namespace"><option value="0">(Main)</option><option value="6">File</option></select>';
const ALL_PAGES = '<ul class="mw-allpages-chunk"><li><a href="/wiki/Apple" title="Apple">Apple</a></li></ul>';

function route(req: http.IncomingMessage, res: http.ServerResponse, body: string) {
  const url = new URL(req.url ?? '/', 'http://wiki.test');
  const title = url.searchParams.get('title');
  if (url.pathname === '/go') {
    res.writeHead(302, { location: '/wiki/Main_Page' }).end();
  } else if (url.pathname === '/wiki/Main_Page') {
    res.end(MAIN_PAGE);
  } else if (url.pathname.startsWith('/w/index.php/Special:Export/')) {
    res.end('<mediawiki single="1"/>');
  } else if (req.method === 'POST') {
    res.end(`<mediawiki bytes="${body.length}"/>`);
  } else if (title === 'Special:PrefixIndex') {
    res.setHeader('set-cookie', 'wikisession=test-session; Path=/');
    res.end(PREFIX_INDEX);
  } else if (title === 'Special:AllPages') {
    res.end(ALL_PAGES);
  } else if (title === 'Special:Redirect/file/Logo.png') {
    res.end('PNGDATA');
  } else if (title === 'Special:Redirect/file/Cut.png') {
    res.writeHead(200, { 'content-length': '100' });
    res.write('PNG');
    setTimeout(() => res.destroy(), 20);
  } else {
    res.writeHead(404).end('not found');
  }
}

function memorySink() {
  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(Buffer.from(chunk));
      callback();
    }
  });
  return { sink, text: () => Buffer.concat(chunks).toString('utf-8') };
}

describe('WikiClient', () => {
  const seen: Seen[] = [];
  const server = http.createServer((req, res) => {
    let body = '';
    req.setEncoding('utf-8');
    req.on('data', (chunk: string) => (body += chunk));
    req.on('end', () => {
      seen.push({ method: req.method ?? '', url: req.url ?? '', headers: req.headers, body });
      route(req, res, body);
    });
  });
  let origin = '';
  let baseUrl = '';
  let client: WikiClient;

  beforeAll(async () => {
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const addr = server.address();
    if (!addr || typeof addr === 'string') throw new Error('server has no port');
    origin = `http://127.0.0.1:${addr.port}`;
    baseUrl = `${origin}/w/index.php`;
    client = new WikiClient(baseUrl, { userAgent: 'wikidump-test', retries: 0, connections: 2, log: () => {} });
  });

  afterAll(async () => {
    client.close();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  const last = (): Seen => {
    const req = seen[seen.length - 1];
    if (!req) throw new Error('no request seen');
    return req;
  };

  it('keeps the base url it was built with', () => {
    expect(client.baseUrl).toBe(baseUrl);
  });

  it('sends the user agent and referer and carries cookies between requests', async () => {
    expect(await client.fetchNamespaces()).toEqual([
      { id: 0, name: '(Main)' },
      { id: 6, name: 'File' }
    ]);
    const first = last();
    expect(first.headers['user-agent']).toBe('wikidump-test');
    expect(first.headers['referer']).toBe(baseUrl);
    expect(first.headers['cookie']).toBeUndefined();

    const listing = await client.fetchListing(6, 'A');
    expect(listing.pages).toEqual(['Apple']);
    expect(listing.chunks).toEqual([]);
    const second = last();
    expect(new URL(second.url, origin).searchParams.get('namespace')).toBe('6');
    expect(new URL(second.url, origin).searchParams.get('from')).toBe('A');
    expect(second.headers['cookie']).toBe('wikisession=test-session');
    expect(second.headers['referer']).toBe(baseUrl);
  });

  it('appends the encoded title to the base url for a single-page export', async () => {
    const body = await client.exportPage('Help:A/B');
    expect(body.toString('utf-8')).toBe('<mediawiki single="1"/>');
    expect(last().url).toBe('/w/index.php/Special:Export/Help%3AA%2FB');
  });

  it('posts the bulk export form to the base url', async () => {
    await client.exportPages(['A', 'B'], true);
    const req = last();
    expect(req.method).toBe('POST');
    expect(req.url).toBe('/w/index.php');
    expect(req.headers['content-type']).toBe('application/x-www-form-urlencoded');
    expect(Object.fromEntries(new URLSearchParams(req.body))).toEqual({
      title: 'Special:Export',
      action: 'submit',
      pages: 'A\nB',
      curonly: 'true'
    });
  });

  it('streams a file into the sink it opens', async () => {
    const { sink, text } = memorySink();
    await client.downloadBinary('Logo.png', () => sink);
    expect(text()).toBe('PNGDATA');
    expect(new URL(last().url, origin).searchParams.get('title')).toBe('Special:Redirect/file/Logo.png');
  });

  it('does not open a sink when the file is missing', async () => {
    let opened = 0;
    const download = client.downloadBinary('Missing.png', () => {
      opened++;
      return memorySink().sink;
    });
    await expect(download).rejects.toBeInstanceOf(TransportError);
    await expect(download).rejects.toMatchObject({ statusCode: 404 });
    expect(opened).toBe(0);
  });

  it('destroys the sink when the transfer breaks off', async () => {
    const { sink } = memorySink();
    await expect(client.downloadBinary('Cut.png', () => sink)).rejects.toBeInstanceOf(TransportError);
    expect(sink.destroyed).toBe(true);
  });

  it('wraps failed requests in a TransportError', async () => {
    await expect(client.get({ title: 'Nowhere' })).rejects.toMatchObject({ kind: 'TRANSPORT', statusCode: 404 });
  });

  it('discovers the base url from a page behind a redirect', async () => {
    expect(await discoverBaseUrl(`${origin}/go`, { log: () => {} })).toBe(baseUrl);
    expect(last().url).toBe('/wiki/Main_Page');
  });
});
