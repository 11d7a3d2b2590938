import http from 'node:http';

import { logger } from './logger';
import { registry } from './metrics';

export interface MetricsServerHandle {
  /** Port actually bound; differs from the requested one when that was 0. */
  port: number;
  close(): Promise<void>;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

export async function startMetricsServer(
  port: number,
  host = '0.0.0.0',
): Promise<MetricsServerHandle> {
  const server = http.createServer(async (req, res) => {
    if (!req.url) {
      sendJson(res, 400, { error: 'bad_request' });
      return;
    }

    if (req.url === '/metrics') {
      try {
        const metrics = await registry.metrics();
        res.writeHead(200, { 'content-type': registry.contentType });
        res.end(metrics);
      } catch (error) {
        logger.error({ err: error }, 'Metrics collection failed');
        sendJson(res, 500, { error: 'collect_failed' });
      }
      return;
    }

    if (req.url === '/health') {
      sendJson(res, 200, { status: 'ok', uptime_s: Math.round(process.uptime()) });
      return;
    }

    sendJson(res, 404, { error: 'not_found' });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = address !== null && typeof address === 'object' ? address.port : port;

  return {
    port: boundPort,
    close: async () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
  };
}
