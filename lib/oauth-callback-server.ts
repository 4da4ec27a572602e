import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { createLogger } from './logger';
import { ExtendedError } from './errors';
import { OAUTH_CALLBACK_PATH } from './credential-providers';

const logger = createLogger('oauth-callback');

export interface CallbackServerOptions {
  port: number;
  timeoutMs?: number;
}

const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

function respond(res: ServerResponse, status: number, title: string, body: string): void {
  res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8' });
  res.end(
    `<!DOCTYPE html><html><head><title>${title}</title></head>` +
      `<body><h1>${title}</h1><p>${body}</p></body></html>`
  );
}

/**
 * Outcome of one request to the loopback listener: a code, a consent error,
 * or nothing for unrelated paths such as /favicon.ico.
 */
export function parseCallback(
  req: Pick<IncomingMessage, 'url'>,
  port: number
): { code: string } | { error: string } | null {
  const url = new URL(req.url ?? '/', `http://localhost:${port}`);
  if (url.pathname !== OAUTH_CALLBACK_PATH) {
    return null;
  }

  const error = url.searchParams.get('error');
  if (error) {
    return { error };
  }

  const code = url.searchParams.get('code');
  return code ? { code } : { error: 'missing authorization code' };
}

/**
 * Listen on localhost until Google redirects back with an authorization code.
 * The listener is closed once a code or a consent error arrives.
 */
export function waitForAuthorizationCode(options: CallbackServerOptions): Promise<string> {
  const { port } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    const server = createServer((req, res) => {
      const outcome = parseCallback(req, port);

      if (!outcome) {
        res.writeHead(404);
        res.end();
        return;
      }

      if ('error' in outcome) {
        respond(res, 400, 'Authorization failed', `Google returned: ${outcome.error}`);
        finish(
          new ExtendedError({
            message: 'Authorization was not granted',
            details: { reason: outcome.error },
          })
        );
        return;
      }

      respond(
        res,
        200,
        'Authorization complete',
        'Google Drive is connected. You can close this window.'
      );
      finish(null, outcome.code);
    });

    const timer = setTimeout(() => {
      finish(
        new ExtendedError({
          message: `No authorization callback received within ${timeoutMs} ms`,
          details: { port },
        })
      );
    }, timeoutMs);

    function finish(error: Error | null, code?: string): void {
      clearTimeout(timer);
      server.close();
      if (error || !code) {
        reject(error ?? new ExtendedError({ message: 'Authorization code missing' }));
      } else {
        resolve(code);
      }
    }

    server.on('error', error => {
      finish(
        new ExtendedError({
          message: 'OAuth callback listener failed',
          cause: error,
          details: { port },
        })
      );
    });

    server.listen(port, 'localhost', () => {
      logger.info('Waiting for OAuth callback', {
        url: `http://localhost:${port}${OAUTH_CALLBACK_PATH}`,
      });
    });
  });
}
