import 'dotenv/config';

import { readFile } from 'node:fs/promises';

import { closeLogger } from '@tilerun/logger';

import { createAutopilot } from './autopilot';
import { loadConfig, type SimulatorConfig } from './config';
import { parseInputScript } from './input';
import { logger } from './logger';
import { startMetricsServer, type MetricsServerHandle } from './metrics-server';
import { runHeadless, scriptSource, startOnTitle, type InputSource } from './runner';
import { createSession } from './session/session';
import { createRng } from './sim/rng';

async function resolveSource(cfg: SimulatorConfig): Promise<InputSource> {
  if (cfg.scriptPath) {
    const raw: unknown = JSON.parse(await readFile(cfg.scriptPath, 'utf8'));
    const commands = parseInputScript(raw);
    logger.info({ scriptPath: cfg.scriptPath, commands: commands.length }, 'Replaying input script');
    return startOnTitle(scriptSource(commands));
  }
  if (cfg.autopilot) {
    return createAutopilot();
  }
  logger.warn('Autopilot disabled without SIM_SCRIPT; the player will stand still');
  return startOnTitle(scriptSource([]));
}

async function main() {
  const cfg = loadConfig();
  logger.info(
    {
      nodeEnv: cfg.nodeEnv,
      seed: cfg.seed ?? null,
      maxTicks: cfg.maxTicks,
      realtime: cfg.realtime,
      autopilot: cfg.autopilot,
      metricsPort: cfg.metricsPort ?? null,
    },
    'Booting simulator',
  );

  let metricsServer: MetricsServerHandle | undefined;
  if (cfg.metricsPort !== undefined) {
    metricsServer = await startMetricsServer(cfg.metricsPort);
    logger.info({ port: metricsServer.port }, 'Metrics server listening');
  }

  const controller = new AbortController();
  (['SIGINT', 'SIGTERM'] as const).forEach((signal) => {
    process.once(signal, () => {
      logger.info({ signal }, 'Received shutdown signal');
      controller.abort();
    });
  });

  const session = createSession({
    rng: createRng(cfg.seed),
    startLives: cfg.startLives,
    logger,
  });
  const source = await resolveSource(cfg);

  const summary = await runHeadless({
    session,
    source,
    maxTicks: cfg.maxTicks,
    realtime: cfg.realtime,
    logger,
    progressEvery: cfg.logProgressEvery,
    signal: controller.signal,
  });

  logger.info(summary, 'Simulation finished');
  await metricsServer?.close();
  closeLogger('simulator');
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Simulator crashed');
  closeLogger('simulator');
  process.exit(1);
});
