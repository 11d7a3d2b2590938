import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  SIM_SEED: z.string().optional(),
  SIM_MAX_TICKS: z.string().optional(),
  SIM_REALTIME: z.string().optional(),
  SIM_AUTOPILOT: z.string().optional(),
  SIM_START_LIVES: z.string().optional(),
  SIM_PROGRESS_EVERY: z.string().optional(),
  SIM_SCRIPT: z.string().optional(),
  SIM_METRICS_PORT: z.string().optional(),
});

export interface SimulatorConfig {
  nodeEnv: string;
  /** Seed for level generation and gameplay rolls; unseeded runs differ every time. */
  seed: string | undefined;
  maxTicks: number;
  realtime: boolean;
  autopilot: boolean;
  startLives: number;
  logProgressEvery: number;
  /** JSON input timeline replayed instead of the autopilot. */
  scriptPath: string | undefined;
  /** Port for the `/metrics` endpoint; unset keeps it closed. */
  metricsPort: number | undefined;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return fallback;
  }
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SimulatorConfig {
  const parsed = EnvSchema.parse(env);

  const safePositive = (value: number, fallback: number): number => {
    if (!Number.isFinite(value) || value <= 0) {
      return fallback;
    }
    return value;
  };

  const seed = parsed.SIM_SEED?.trim();
  const scriptPath = parsed.SIM_SCRIPT?.trim();
  const metricsPort = parseInteger(parsed.SIM_METRICS_PORT, 0);

  return {
    nodeEnv: parsed.NODE_ENV ?? 'development',
    seed: seed && seed.length > 0 ? seed : undefined,
    maxTicks: safePositive(parseInteger(parsed.SIM_MAX_TICKS, 36_000), 36_000),
    realtime: parseFlag(parsed.SIM_REALTIME, false),
    autopilot: parseFlag(parsed.SIM_AUTOPILOT, true) && !scriptPath,
    startLives: safePositive(parseInteger(parsed.SIM_START_LIVES, 3), 3),
    logProgressEvery: safePositive(parseInteger(parsed.SIM_PROGRESS_EVERY, 600), 600),
    scriptPath: scriptPath && scriptPath.length > 0 ? scriptPath : undefined,
    metricsPort: metricsPort > 0 && metricsPort <= 65_535 ? metricsPort : undefined,
  };
}
