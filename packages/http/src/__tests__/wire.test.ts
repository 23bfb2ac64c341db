import { afterEach, describe, expect, it } from 'vitest';

import { HttpClient } from '../client.js';
import { GetRequest, HeadRequest, PostRequest, PutRequest } from '../request.js';
import { TransportError } from '../types.js';

import { startTestServer, type RecordedRequest, type TestServer } from './helpers/test-server.js';

const headersNamed = (request: RecordedRequest | undefined, names: string[]): [string, string][] =>
  (request?.rawHeaders ?? [])
    .map(([name, value]): [string, string] => [name.toLowerCase(), value])
    .filter(([name]) => names.includes(name));

describe('HttpClient over a local server', () => {
  let server: TestServer | undefined;
  let client: HttpClient | undefined;

  afterEach(async () => {
    await client?.close();
    await server?.close();
    client = undefined;
    server = undefined;
  });

  it('sends the body as UTF-8 JSON with the JSON content type', async () => {
    server = await startTestServer((_request, response) => {
      response.writeHead(200).end('ok');
    });
    client = new HttpClient();

    const request = new PostRequest(`${server.url}/users`, '{"name":"John"}').addHeader('Content-Type', 'text/plain');
    const result = await client.executePostRequest(request);

    expect(result._unsafeUnwrap().body).toBe('ok');
    const [received] = server.requests;
    expect(received?.method).toBe('POST');
    expect(received?.url).toBe('/users');
    expect(received?.body).toBe('{"name":"John"}');
    expect(headersNamed(received, ['accept', 'content-type'])).toEqual([
      ['accept', 'application/json'],
      ['content-type', 'application/json; utf-8'],
    ]);
  });

  it('encodes non-ASCII bodies as UTF-8', async () => {
    server = await startTestServer((_request, response) => {
      response.writeHead(200).end();
    });
    client = new HttpClient();

    await client.execute(new PutRequest(`${server.url}/notes/1`, '{"text":"héllo ✓"}'));

    const [received] = server.requests;
    expect(received?.body).toBe('{"text":"héllo ✓"}');
    expect(received?.headers['content-length']).toBe(String(Buffer.byteLength('{"text":"héllo ✓"}', 'utf8')));
  });

  it('sends Accept first and every caller header in order, duplicates included', async () => {
    server = await startTestServer((_request, response) => {
      response.writeHead(200).end();
    });
    client = new HttpClient();

    const request = new GetRequest(`${server.url}/search?q=tea`)
      .addHeader('X-Tag', 'one')
      .addHeader('X-Tag', 'two')
      .addHeader('X-Other', 'three');
    await client.execute(request);

    const [received] = server.requests;
    expect(received?.url).toBe('/search?q=tea');
    expect(headersNamed(received, ['accept', 'x-tag', 'x-other', 'content-type'])).toEqual([
      ['accept', 'application/json'],
      ['x-tag', 'one'],
      ['x-tag', 'two'],
      ['x-other', 'three'],
    ]);
  });

  it('asks the server to close the connection after each exchange', async () => {
    server = await startTestServer((_request, response) => {
      response.writeHead(200).end();
    });
    client = new HttpClient();

    await client.execute(new GetRequest(`${server.url}/`));

    expect(server.requests[0]?.headers.connection).toBe('close');
  });

  it('joins repeated response headers', async () => {
    server = await startTestServer((_request, response) => {
      response.setHeader('X-Multi', ['one', 'two']);
      response.setHeader('Set-Cookie', ['a=1', 'b=2']);
      response.writeHead(200).end('{}');
    });
    client = new HttpClient();

    const result = await client.execute(new GetRequest(`${server.url}/`));

    const response = result._unsafeUnwrap();
    expect(response.header('x-multi')).toBe('one,two');
    expect(response.header('Set-Cookie')).toBe('a=1,b=2');
  });

  it('follows a redirect with a GET that carries the original headers and no body', async () => {
    server = await startTestServer((request, response) => {
      if (request.url === '/start') {
        response.writeHead(302, { Location: '/end' }).end('moving');
        return;
      }
      response.writeHead(200).end('arrived');
    });
    client = new HttpClient();

    const request = new PostRequest(`${server.url}/start`, '{"a":1}').addHeader('X-Trace', 'abc');
    const result = await client.execute(request);

    expect(result._unsafeUnwrap().body).toBe('arrived');
    expect(server.requests.map((received) => `${received.method} ${received.url}`)).toEqual([
      'POST /start',
      'GET /end',
    ]);
    const followUp = server.requests[1];
    expect(followUp?.body).toBe('');
    expect(headersNamed(followUp, ['accept', 'x-trace', 'content-type'])).toEqual([
      ['accept', 'application/json'],
      ['x-trace', 'abc'],
    ]);
  });

  it('reads no body for HEAD', async () => {
    server = await startTestServer((_request, response) => {
      response.writeHead(200, { 'Content-Length': '5' }).end();
    });
    client = new HttpClient();

    const result = await client.executeHeadRequest(new HeadRequest(`${server.url}/`));

    expect(result._unsafeUnwrap()).toMatchObject({ statusCode: 200, body: '' });
    expect(result._unsafeUnwrap().header('content-length')).toBe('5');
  });

  it('fails with TransportError when the server does not answer in time', async () => {
    server = await startTestServer(() => {
      // never responds
    });
    client = new HttpClient({ readTimeoutMs: 100 });

    const result = await client.execute(new GetRequest(`${server.url}/slow`));

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.cause.name).toBe('HeadersTimeoutError');
    }
  });

  it('fails with TransportError when the connection is refused', async () => {
    const closed = await startTestServer(() => {});
    const url = `${closed.url}/`;
    await closed.close();
    client = new HttpClient({ connectTimeoutMs: 1000 });

    const result = await client.execute(new GetRequest(url));

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(TransportError);
    expect(error.message.startsWith(`Request to ${url} failed: `)).toBe(true);
  });
});
