import assert from 'node:assert/strict';
import diagnosticsChannel from 'node:diagnostics_channel';
import { after, describe, it, mock } from 'node:test';

import { FetchError } from '../src/errors.js';
import { closeAgents, HttpWebClient } from '../src/fetch.js';

type FetchInput = Parameters<typeof fetch>[0];
type FetchInit = Parameters<typeof fetch>[1];

interface SeenRequest {
  readonly url: string;
  readonly method: string;
  readonly redirect: string | undefined;
  readonly userAgent: string | null;
}

function inputUrl(input: FetchInput): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

function withMockedFetch(
  implementation: typeof fetch,
  execute: () => Promise<void>
): Promise<void> {
  const mocked = mock.method(globalThis, 'fetch', implementation);

  return execute().finally(() => {
    mocked.mock.restore();
  });
}

function recordingFetch(
  respond: (url: string, call: number, init: FetchInit) => Promise<Response>
): { fake: typeof fetch; seen: SeenRequest[] } {
  const seen: SeenRequest[] = [];
  const fake: typeof fetch = async (input, init) => {
    const url = inputUrl(input);
    seen.push({
      url,
      method: init?.method ?? 'GET',
      redirect: init?.redirect,
      userAgent: new Headers(init?.headers).get('user-agent'),
    });
    return respond(url, seen.length, init);
  };
  return { fake, seen };
}

function rejectOnAbort(init: FetchInit): Promise<never> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) {
      reject(new Error('request has no signal'));
      return;
    }
    // Timeout signals are unref'd; this timer keeps the loop alive meanwhile.
    const guard = setTimeout(() => {
      reject(new Error('request was never aborted'));
    }, 5000);
    const fail = (): void => {
      clearTimeout(guard);
      reject(signal.reason);
    };
    if (signal.aborted) fail();
    else signal.addEventListener('abort', fail, { once: true });
  });
}

function isFetchError(
  expected: Partial<Pick<FetchError, 'message' | 'statusCode' | 'code'>>
): (error: unknown) => boolean {
  return (error) => {
    assert.ok(error instanceof FetchError);
    if (expected.message !== undefined) {
      assert.equal(error.message, expected.message);
    }
    if (expected.statusCode !== undefined) {
      assert.equal(error.statusCode, expected.statusCode);
    }
    if (expected.code !== undefined) assert.equal(error.code, expected.code);
    return true;
  };
}

const live = (): AbortSignal => new AbortController().signal;

describe('HttpWebClient', () => {
  after(async () => {
    await closeAgents();
  });

  it('resolves with the body and status of any response', async () => {
    const { fake, seen } = recordingFetch(async () =>
      new Response('nope', { status: 404 })
    );
    const client = new HttpWebClient({ userAgent: 'test-agent' });

    await withMockedFetch(fake, async () => {
      const page = await client.fetch(live(), 'http://x.test/', 'GET');

      assert.equal(page.status, 404);
      assert.equal(page.url, 'http://x.test/');
      assert.equal(Buffer.from(page.body).toString('utf8'), 'nope');
    });

    assert.deepEqual(seen, [
      {
        url: 'http://x.test/',
        method: 'GET',
        redirect: 'manual',
        userAgent: 'test-agent',
      },
    ]);
  });

  it('sends HEAD requests and skips the body', async () => {
    const { fake, seen } = recordingFetch(async () =>
      new Response('ignored', { status: 200 })
    );
    const client = new HttpWebClient();

    await withMockedFetch(fake, async () => {
      const page = await client.fetch(live(), 'http://x.test/a', 'HEAD');

      assert.equal(page.status, 200);
      assert.equal(page.body.byteLength, 0);
    });

    assert.equal(seen[0]?.method, 'HEAD');
  });

  it('follows redirects and reports the final URL', async () => {
    const { fake, seen } = recordingFetch(async (_url, call) =>
      call === 1
        ? new Response(null, { status: 302, headers: { location: '/next' } })
        : new Response('done', { status: 200 })
    );
    const client = new HttpWebClient();

    await withMockedFetch(fake, async () => {
      const page = await client.fetch(live(), 'http://x.test/start', 'GET');

      assert.equal(page.url, 'http://x.test/next');
      assert.equal(Buffer.from(page.body).toString('utf8'), 'done');
    });

    assert.deepEqual(
      seen.map((request) => request.url),
      ['http://x.test/start', 'http://x.test/next']
    );
  });

  it('gives up after the redirect limit', async () => {
    const { fake, seen } = recordingFetch(async () =>
      new Response(null, { status: 301, headers: { location: '/loop' } })
    );
    const client = new HttpWebClient({ maxRedirects: 1 });

    await withMockedFetch(fake, async () => {
      await assert.rejects(
        client.fetch(live(), 'http://x.test/', 'GET'),
        isFetchError({ message: 'Too many redirects', code: 'FETCH_ERROR' })
      );
    });

    assert.equal(seen.length, 2);
  });

  it('rejects a redirect without a Location header', async () => {
    const { fake } = recordingFetch(async () =>
      new Response(null, { status: 307 })
    );
    const client = new HttpWebClient();

    await withMockedFetch(fake, async () => {
      await assert.rejects(
        client.fetch(live(), 'http://x.test/', 'GET'),
        isFetchError({ message: 'Redirect response missing Location header' })
      );
    });
  });

  it('rejects a redirect to a non-http scheme', async () => {
    const { fake } = recordingFetch(async () =>
      new Response(null, {
        status: 302,
        headers: { location: 'ftp://x.test/file' },
      })
    );
    const client = new HttpWebClient();

    await withMockedFetch(fake, async () => {
      await assert.rejects(
        client.fetch(live(), 'http://x.test/', 'GET'),
        isFetchError({ message: 'Invalid redirect target' })
      );
    });
  });

  it('rejects bodies larger than the limit announced by Content-Length', async () => {
    const { fake } = recordingFetch(async () =>
      new Response('x'.repeat(20), {
        status: 200,
        headers: { 'content-length': '20' },
      })
    );
    const client = new HttpWebClient({ maxContentLength: 10 });

    await withMockedFetch(fake, async () => {
      await assert.rejects(
        client.fetch(live(), 'http://x.test/', 'GET'),
        isFetchError({
          message: 'Response exceeds maximum size of 10 bytes',
          statusCode: 502,
        })
      );
    });
  });

  it('rejects streamed bodies that grow past the limit', async () => {
    const chunk = new TextEncoder().encode('12345678');
    const { fake } = recordingFetch(async () => {
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(chunk);
          controller.enqueue(chunk);
          controller.close();
        },
      });
      return new Response(stream, { status: 200 });
    });
    const client = new HttpWebClient({ maxContentLength: 10 });

    await withMockedFetch(fake, async () => {
      await assert.rejects(
        client.fetch(live(), 'http://x.test/', 'GET'),
        isFetchError({ message: 'Response exceeds maximum size of 10 bytes' })
      );
    });
  });

  it('maps transport failures to a network error', async () => {
    const { fake } = recordingFetch(async () => {
      const cause = Object.assign(new Error('connect ECONNREFUSED'), {
        code: 'ECONNREFUSED',
      });
      throw new TypeError('fetch failed', { cause });
    });
    const client = new HttpWebClient();

    await withMockedFetch(fake, async () => {
      await assert.rejects(
        client.fetch(live(), 'http://x.test/', 'GET'),
        (error: unknown) => {
          assert.ok(error instanceof FetchError);
          assert.equal(error.message, 'Network error: Could not reach http://x.test/');
          assert.equal(error.statusCode, 502);
          assert.equal(error.details['code'], 'ECONNREFUSED');
          return true;
        }
      );
    });
  });

  it('maps caller cancellation to 499', async () => {
    const { fake } = recordingFetch(async (_url, _call, init) =>
      rejectOnAbort(init)
    );
    const client = new HttpWebClient();
    const controller = new AbortController();
    controller.abort();

    await withMockedFetch(fake, async () => {
      await assert.rejects(
        client.fetch(controller.signal, 'http://x.test/', 'GET'),
        isFetchError({
          message: 'Request was canceled',
          statusCode: 499,
          code: 'HTTP_499',
        })
      );
    });
  });

  it('maps its own deadline to 504', async () => {
    const { fake } = recordingFetch(async (_url, _call, init) =>
      rejectOnAbort(init)
    );
    const client = new HttpWebClient({ timeoutMs: 20 });

    await withMockedFetch(fake, async () => {
      await assert.rejects(
        client.fetch(live(), 'http://x.test/', 'GET'),
        isFetchError({
          message: 'Request timeout after 20ms',
          statusCode: 504,
          code: 'HTTP_504',
        })
      );
    });
  });

  it('publishes start and end events on the fetch channel', async () => {
    const events: string[] = [];
    const onMessage = (message: unknown): void => {
      if (typeof message === 'object' && message !== null && 'type' in message) {
        events.push(String(message.type));
      }
    };
    diagnosticsChannel.subscribe('page-analyzer.fetch', onMessage);
    const { fake } = recordingFetch(async () =>
      new Response('ok', { status: 200 })
    );
    const client = new HttpWebClient();

    try {
      await withMockedFetch(fake, async () => {
        await client.fetch(live(), 'http://x.test/', 'GET');
      });
    } finally {
      diagnosticsChannel.unsubscribe('page-analyzer.fetch', onMessage);
    }

    assert.deepEqual(events, ['start', 'end']);
  });
});
