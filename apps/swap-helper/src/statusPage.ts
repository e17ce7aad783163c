import { createServer, type Server } from 'http';
import type { StatusPage } from './swapProtocol.js';

const PAGE = `<!doctype html>
<html>
<head>
<meta charset="utf-8">
<meta http-equiv="refresh" content="5">
<title>Updating</title>
</head>
<body>
<h1>Updating</h1>
<p>The orchestrator is being updated and will be back in a moment.</p>
</body>
</html>
`;

export interface HttpStatusPage extends StatusPage {
  /** Port actually bound while open, else null */
  port(): number | null;
}

/**
 * A plain HTTP server answering every request with 503 and a page that
 * reloads itself. Open and close are idempotent.
 */
export function createStatusPage(port: number, host = '0.0.0.0'): HttpStatusPage {
  let server: Server | null = null;

  return {
    open: () => new Promise<void>((resolve, reject) => {
      if (server) {
        resolve();
        return;
      }
      const listening = createServer((req, res) => {
        const wantsJson = (req.headers.accept ?? '').includes('application/json');
        res.statusCode = 503;
        res.setHeader('Retry-After', '5');
        if (wantsJson) {
          res.setHeader('Content-Type', 'application/json');
          res.end(JSON.stringify({ status: 'updating' }));
        } else {
          res.setHeader('Content-Type', 'text/html; charset=utf-8');
          res.end(PAGE);
        }
      });
      listening.once('error', reject);
      listening.listen(port, host, () => {
        server = listening;
        resolve();
      });
    }),

    close: () => new Promise<void>((resolve, reject) => {
      const open = server;
      if (!open) {
        resolve();
        return;
      }
      server = null;
      open.close(err => (err ? reject(err) : resolve()));
    }),

    port: () => {
      const address = server?.address();
      return address && typeof address === 'object' ? address.port : null;
    },
  };
}
