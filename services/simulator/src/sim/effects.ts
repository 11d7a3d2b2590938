import { COLOR_BRICK, COLOR_WHITE, PARTICLE_GRAVITY, PARTICLE_LIFE, TEXT_LIFE } from './constants';
import type { Rng } from './rng';

export interface Particle {
  x: number;
  y: number;
  vx: number;
  vy: number;
  color: number;
  life: number;
}

export interface FloatingText {
  x: number;
  y: number;
  text: string;
  life: number;
}

export function createParticle(x: number, y: number, vx = 0, vy = 0, color = COLOR_WHITE): Particle {
  return { x, y, vx, vy, color, life: PARTICLE_LIFE };
}

export function createText(text: string, x: number, y: number): FloatingText {
  return { x, y, text, life: TEXT_LIFE };
}

/** Four quarter-tile shards thrown up and out from a broken brick. */
export function brickDebris(x: number, y: number, size: number): Particle[] {
  const half = size / 2;
  return [0, 1, 2, 3].map((i) =>
    createParticle(
      x + (i % 2) * half,
      y + Math.floor(i / 2) * half,
      i % 2 === 0 ? -3 : 3,
      i < 2 ? -8 : -5,
      COLOR_BRICK,
    ),
  );
}

export function burst(
  rng: Rng,
  area: { x: number; y: number; width: number; height: number },
  count = 6,
): Particle[] {
  return Array.from({ length: count }, () =>
    createParticle(
      area.x + rng.int(0, area.width),
      area.y + rng.int(0, area.height),
      rng.uniform(-3, 3),
      rng.uniform(-8, -2),
      COLOR_WHITE,
    ),
  );
}

export function fireworks(rng: Rng, left: number, width: number, height: number): Particle[] {
  return Array.from({ length: 5 }, () => {
    const color = (rng.int(100, 255) << 16) | (rng.int(100, 255) << 8) | rng.int(100, 255);
    return createParticle(
      left + rng.int(0, width),
      rng.int(0, Math.floor(height / 2)),
      rng.uniform(-2, 2),
      rng.uniform(-4, 0),
      color,
    );
  });
}

export function stepParticles(particles: Particle[]): Particle[] {
  for (const particle of particles) {
    particle.x += particle.vx;
    particle.y += particle.vy;
    particle.vy += PARTICLE_GRAVITY;
    particle.life -= 1;
  }
  return particles.filter((particle) => particle.life > 0);
}

export function stepTexts(texts: FloatingText[]): FloatingText[] {
  for (const text of texts) {
    text.y -= 1;
    text.life -= 1;
  }
  return texts.filter((text) => text.life > 0);
}
