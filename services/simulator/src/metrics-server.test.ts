import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ticksTotal } from './metrics';
import { startMetricsServer, type MetricsServerHandle } from './metrics-server';

describe('metrics server', () => {
  let handle: MetricsServerHandle;
  let base: string;

  beforeEach(async () => {
    handle = await startMetricsServer(0, '127.0.0.1');
    base = `http://127.0.0.1:${handle.port}`;
  });

  afterEach(async () => {
    await handle.close();
  });

  it('serves the registry in the Prometheus text format', async () => {
    ticksTotal.inc();

    const response = await fetch(`${base}/metrics`);
    const body = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/plain');
    expect(body).toContain('# TYPE sim_ticks_total counter');
  });

  it('answers health checks', async () => {
    const response = await fetch(`${base}/health`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok' });
  });

  it('rejects unknown paths', async () => {
    const response = await fetch(`${base}/levels`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'not_found' });
  });
});
