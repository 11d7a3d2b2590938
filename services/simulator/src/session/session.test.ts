import { describe, expect, it } from 'vitest';

import { TileGrid } from '../level/grid';
import { ManualClock } from '../sim/clock';
import { createEmergingPowerUp, createEntity } from '../sim/entities';
import { killPlayer } from '../sim/player';
import { createRng } from '../sim/rng';
import { flatGrid, worldFromGrid } from '../testing/fixtures';
import type { SimEvent } from '../sim/events';
import type { World } from '../sim/world';

import {
  advanceStage,
  collectCoin,
  createSession,
  currentStage,
  handleInput,
  startGame,
  tickSession,
  type Session,
} from './session';
import { buildSnapshot } from './snapshot';

function newSession(clock = new ManualClock()): Session {
  return createSession({ rng: createRng('test-seed'), clock });
}

/** Skips the world intro and empties the stage of enemies. */
function startPlaying(session: Session): World {
  startGame(session);
  session.introTicks = 1;
  tickSession(session);
  const stage = currentStage(session);
  stage.pending = [];
  stage.entities = [];
  return stage;
}

/** Drops the session straight into a hand-built stage. */
function playOn(session: Session, stage: World): void {
  session.stage = stage;
  session.state = 'playing';
}

function tickTimes(session: Session, count: number): SimEvent[] {
  const events: SimEvent[] = [];
  for (let i = 0; i < count; i += 1) {
    events.push(...tickSession(session));
  }
  return events;
}

describe('session', () => {
  describe('state machine', () => {
    it('starts on the title screen without a stage', () => {
      const session = newSession();

      expect(session.state).toBe('title');
      expect(session.stage).toBeNull();
      expect(() => currentStage(session)).toThrow('No stage loaded while title');
    });

    it('moves from title through the world intro into play', () => {
      const session = newSession();

      handleInput(session, { action: 'confirm', pressed: true });
      expect(session.state).toBe('worldIntro');
      expect(session.stage?.level.theme).toBe('overworld');

      const events = tickTimes(session, 179);
      expect(events).toContainEqual({ type: 'stateChanged', from: 'title', to: 'worldIntro' });
      expect(session.state).toBe('worldIntro');

      tickSession(session);
      expect(session.state).toBe('playing');
    });

    it('pauses and resumes, freezing the stage meanwhile', () => {
      const session = newSession();
      startPlaying(session);

      handleInput(session, { action: 'pause', pressed: true });
      expect(session.state).toBe('paused');

      const before = { ...session.player };
      tickTimes(session, 10);
      expect(session.player).toEqual(before);

      handleInput(session, { action: 'pause', pressed: false });
      expect(session.state).toBe('paused');
      handleInput(session, { action: 'pause', pressed: true });
      expect(session.state).toBe('playing');
    });

    it('returns to the title from play', () => {
      const session = newSession();
      startPlaying(session);

      handleInput(session, { action: 'confirm', pressed: true });
      expect(session.state).toBe('playing');

      handleInput(session, { action: 'back', pressed: true });
      expect(session.state).toBe('title');
    });

    it('ends in game over when the last life goes, then resets from confirm', () => {
      const session = newSession();
      const stage = startPlaying(session);
      session.lives = 1;
      session.score = 1234;

      killPlayer(session.player, stage, 'enemy');
      const events = tickTimes(session, 180);

      expect(session.state).toBe('gameOver');
      expect(session.lives).toBe(0);
      expect(events).toContainEqual({ type: 'lifeLost', livesLeft: 0 });
      expect(events).toContainEqual({ type: 'stateChanged', from: 'playing', to: 'gameOver' });

      handleInput(session, { action: 'confirm', pressed: true });
      expect(session.state).toBe('title');
      expect(session.lives).toBe(3);
      expect(session.score).toBe(0);
      expect(session.world).toBe(1);
      expect(session.level).toBe(1);
    });
  });

  describe('counters', () => {
    it('trades a hundred coins for an extra life', () => {
      const session = newSession();
      const stage = startPlaying(session);
      session.coins = 99;

      collectCoin(session);

      expect(session.coins).toBe(0);
      expect(session.lives).toBe(4);
      expect(session.score).toBe(200);
      expect(session.events).toContainEqual({ type: 'extraLife' });
      expect(stage.texts.map((text) => text.text)).toContain('1UP!');
    });

    it('folds stage events into the score', () => {
      const session = newSession();
      const stage = startPlaying(session);
      stage.events.push({ type: 'score', points: 300 }, { type: 'coin' });

      tickSession(session);

      expect(session.score).toBe(500);
      expect(session.coins).toBe(1);
    });

    it('kills the player once when time runs out, then costs a life', () => {
      const clock = new ManualClock();
      const session = newSession(clock);
      startPlaying(session);
      session.timeRemaining = 1;

      clock.advance(1000);
      const killTick = tickSession(session);
      expect(session.timeRemaining).toBe(0);
      expect(killTick).toContainEqual({ type: 'playerKilled', cause: 'time' });

      clock.advance(5000);
      const dying = tickTimes(session, 179);
      expect(dying.filter((event) => event.type === 'playerKilled')).toEqual([]);
      expect(session.lives).toBe(3);

      const respawn = tickSession(session);
      expect(respawn).toContainEqual({ type: 'lifeLost', livesLeft: 2 });
      expect(session.lives).toBe(2);
      expect(session.state).toBe('playing');
      expect(session.timeRemaining).toBe(400);
      expect(session.player.dead).toBe(false);
    });

    it('adds the time bonus and moves to the next stage', () => {
      const session = newSession();
      startPlaying(session);

      advanceStage(session);

      expect(session.score).toBe(20000);
      expect(session.world).toBe(1);
      expect(session.level).toBe(2);
      expect(session.state).toBe('worldIntro');
      expect(session.introTicks).toBe(180);
    });

    it('keeps the power tier across a death', () => {
      const session = newSession();
      const stage = startPlaying(session);
      session.player.tier = 'fire';
      session.player.starTimer = 50;

      killPlayer(session.player, stage, 'fall');
      tickTimes(session, 180);

      expect(session.player.tier).toBe('fire');
      expect(session.player.starTimer).toBe(0);
    });
  });

  describe('victory', () => {
    it('celebrates after the final stage with fireworks', () => {
      const session = newSession();
      startPlaying(session);
      session.world = 8;
      session.level = 4;

      advanceStage(session);
      expect(session.state).toBe('victory');

      tickTimes(session, 19);
      expect(currentStage(session).particles).toEqual([]);
      tickSession(session);
      expect(currentStage(session).particles).toHaveLength(5);
    });
  });

  describe('completion sequences', () => {
    it('slides down the flag pole and walks off to the next stage', () => {
      const session = newSession();
      const stage = worldFromGrid(flatGrid(40));
      stage.level.flagPoleX = 30;
      playOn(session, stage);
      session.player.x = 928;
      session.player.y = 288;

      tickSession(session);
      expect(session.flag).toEqual({ y: 64 });
      expect(session.player.x).toBe(944);
      expect(session.score).toBe(300);

      tickTimes(session, 74);
      expect(session.state).toBe('playing');
      const cleared = tickSession(session);
      expect(session.state).toBe('levelComplete');
      expect(cleared).toContainEqual({ type: 'levelCleared', theme: 'overworld', world: 1, level: 1 });

      tickTimes(session, 300);
      expect(session.level).toBe(2);
      expect(session.score).toBe(20300);
    });

    it('drops the castle bridge once the axe is touched', () => {
      const session = newSession();
      const grid = new TileGrid(40);
      grid.fill(0, 10, 9, 11, 'ground');
      grid.fill(10, 8, 20, 8, 'bridge');
      grid.fill(10, 9, 20, 11, 'lava');
      grid.fill(21, 10, 39, 11, 'hard');
      grid.setTile(21, 7, 'axe');
      const stage = worldFromGrid(grid, createRng('test-seed'), 'castle');
      stage.level.axe = { x: 21, y: 7 };
      stage.level.bridge = { start: 10, end: 20, row: 8 };
      playOn(session, stage);
      session.player.x = 650;
      session.player.y = 224;

      tickSession(session);
      expect(grid.tileAt(21, 7)).toBe('air');
      expect(session.bridge).toEqual({ next: 10, last: 19, row: 8, countdown: 4 });

      tickTimes(session, 43);
      expect(session.state).toBe('playing');
      expect(grid.tileAt(10, 8)).toBe('air');
      expect(grid.tileAt(19, 8)).toBe('air');
      expect(grid.tileAt(20, 8)).toBe('bridge');

      tickSession(session);
      expect(session.state).toBe('levelComplete');
      expect(session.player.dead).toBe(false);
    });
  });

  it('throws a fireball when run is pressed in play', () => {
    const session = newSession();
    const stage = startPlaying(session);
    session.player.tier = 'fire';

    handleInput(session, { action: 'run', pressed: true });

    expect(session.input.run).toBe(true);
    expect(stage.entities.map((entity) => entity.kind)).toEqual(['fireball']);
  });

  it('drops collected pickups before the frame is published', () => {
    const session = newSession();
    const stage = startPlaying(session);
    const mushroom = createEmergingPowerUp('mushroom', 3, 9);
    mushroom.active = true;
    mushroom.emergeTargetY = null;
    stage.entities = [mushroom, createEntity({ kind: 'goomba', x: 400, y: 288, vx: -1 })];

    tickSession(session);

    expect(session.player.tier).toBe('big');
    expect(stage.entities.map((entity) => entity.kind)).toEqual(['goomba']);
    expect(buildSnapshot(session).entities.map((view) => view.kind)).toEqual(['goomba']);
  });
});
