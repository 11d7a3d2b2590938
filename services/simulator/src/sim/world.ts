import type { GeneratedLevel, EntitySpawn } from '../level/generator';
import type { TileGrid } from '../level/grid';

import type { FloatingText, Particle } from './effects';
import { createText } from './effects';
import type { Entity } from './entities';
import type { SimEvent } from './events';
import type { Rng } from './rng';

/** Everything that lives inside one loaded level. Rebuilt on every load. */
export interface World {
  level: GeneratedLevel;
  grid: TileGrid;
  underwater: boolean;
  entities: Entity[];
  /** Spawns not yet reached by the camera, sorted by x. */
  pending: EntitySpawn[];
  particles: Particle[];
  texts: FloatingText[];
  camera: number;
  rng: Rng;
  events: SimEvent[];
}

export function createWorld(level: GeneratedLevel, rng: Rng): World {
  return {
    level,
    grid: level.grid,
    underwater: level.theme === 'underwater',
    entities: [],
    pending: [...level.spawns],
    particles: [],
    texts: [],
    camera: 0,
    rng,
    events: [],
  };
}

export function emit(world: World, event: SimEvent): void {
  world.events.push(event);
}

/** Awards points and floats the amount at the given position. */
export function award(world: World, points: number, x: number, y: number): void {
  emit(world, { type: 'score', points });
  world.texts.push(createText(`+${points}`, x, y));
}

export function drainEvents(world: World): SimEvent[] {
  const events = world.events;
  world.events = [];
  return events;
}
