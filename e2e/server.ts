import { type ServerType, serve } from '@hono/node-server';
import { type Context, Hono } from 'hono';
import { type SafeWrapAsync, safeWrapAsync } from '../src/utils/wrap.js';

/** Request as seen by the stub, header names lower-cased. */
export type RecordedRequest = {
  method: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  body: unknown;
};

export type LemmyStub = {
  app: Hono;
  requests: RecordedRequest[];
};

export type E2EServer = {
  url: string;
  domain: string;
  close: () => Promise<Error | null>;
};

/** Token handed out by the stub on a successful login. */
export const STUB_JWT = 'abc';
/** Only password the stub accepts. */
export const STUB_PASSWORD = 'test-password';

/**
 * In-process stand-in for a Lemmy instance, covering the endpoints the e2e suite calls.
 */
export function createLemmyStub(): LemmyStub {
  const requests: RecordedRequest[] = [];
  const app = new Hono();

  async function record(c: Context) {
    const [, body] = await safeWrapAsync((): Promise<unknown> => c.req.json());
    requests.push({
      method: c.req.method,
      path: c.req.path,
      query: c.req.query(),
      headers: c.req.header(),
      body: body ?? null,
    });
  }

  function isAuthorized(c: Context) {
    return c.req.header('authorization') === `Bearer ${STUB_JWT}`;
  }

  app.post('/api/v3/user/login', async (c) => {
    await record(c);
    const [errParse, body] = await safeWrapAsync((): Promise<unknown> => c.req.json());
    if (errParse || typeof body !== 'object' || body === null || !('password' in body)) {
      return c.json({ error: 'couldnt_parse_json' }, 400);
    }

    if (body.password !== STUB_PASSWORD) {
      return c.json({ error: 'incorrect_login' }, 400);
    }

    return c.json({ jwt: STUB_JWT, registration_created: false, verify_email_sent: false });
  });

  app.get('/api/v3/user/validate_auth', async (c) => {
    await record(c);
    if (!isAuthorized(c)) {
      return c.json({ error: 'not_logged_in' }, 401);
    }

    return c.json({ success: true });
  });

  app.get('/api/v3/post/list', async (c) => {
    await record(c);
    return c.json({ posts: [] });
  });

  app.put('/api/v3/community/hide', async (c) => {
    await record(c);
    if (!isAuthorized(c)) {
      return c.json({ error: 'not_logged_in' }, 401);
    }

    return c.json({ success: true });
  });

  app.get('/api/v3/federated_instances', async (c) => {
    await record(c);
    return c.text('Bad Gateway', 502);
  });

  return { app, requests };
}

/**
 * Serves an app on an ephemeral loopback port.
 */
export async function startE2EServer(app: Hono): SafeWrapAsync<Error, E2EServer> {
  const [errServer, serverAndPort] = await safeWrapAsync(
    () =>
      new Promise<[ServerType, number]>((resolve) => {
        const srv = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (serverInfo) => {
          resolve([srv, serverInfo.port]);
        });
      }),
  );

  if (errServer) {
    return [new Error('error starting server', { cause: errServer }), null];
  }

  const [server, port] = serverAndPort;

  return [
    null,
    {
      url: `http://127.0.0.1:${port}`,
      domain: `127.0.0.1:${port}`,
      close: () =>
        new Promise<Error | null>((resolve) =>
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing server', { cause: err }));
              return;
            }

            resolve(null);
          }),
        ),
    },
  ];
}
