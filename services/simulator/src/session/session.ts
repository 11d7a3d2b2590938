import {
  STAGE_TIME_SECONDS,
  STARTING_LIVES,
  TILE_SIZE,
  VIEWPORT_HEIGHT,
  VIEWPORT_WIDTH,
  getTheme,
  nextStage,
  type InputEventT,
  type SessionStateName,
} from '@tilerun/game-spec';
import { stageLogger, type Logger } from '@tilerun/logger';

import { NoStageError } from '../errors';
import { defaultInput, isHeldKey, type InputState } from '../input';
import { generateLevel } from '../level/generator';
import { logger as serviceLogger } from '../logger';
import { systemClock, type Clock } from '../sim/clock';
import {
  BRIDGE_COLLAPSE_TICKS,
  CAMERA_EASE,
  CAMERA_LEAD,
  COINS_PER_LIFE,
  FIREWORK_INTERVAL,
  FLAG_BOTTOM_Y,
  FLAG_SLIDE_SPEED,
  FLAG_TOP_Y,
  FLAG_TRIGGER_DISTANCE,
  LEVEL_COMPLETE_HOLD_TICKS,
  SCORE_COIN,
  SCORE_FLAG_ROW,
  TIME_BONUS_PER_SECOND,
  WALK_OFF_MARGIN,
  WALK_OFF_SPEED,
  WORLD_INTRO_TICKS,
} from '../sim/constants';
import { resolveEntityContacts, resolvePlayerContacts } from '../sim/contacts';
import { createText, fireworks, stepParticles, stepTexts } from '../sim/effects';
import { sweepEntities, updateEntities } from '../sim/entities';
import type { SimEvent } from '../sim/events';
import {
  applyGravity,
  createPlayer,
  killPlayer,
  overlaps,
  playerBox,
  resolveVertical,
  respawnPlayer,
  shootFireball,
  stepDeath,
  stepPlayer,
  tickPlayerTimers,
  type PlayerState,
} from '../sim/player';
import { createRng, type Rng } from '../sim/rng';
import { award, createWorld, drainEvents, type World } from '../sim/world';

export interface FlagSequence {
  /** Top of the flag in world pixels. */
  y: number;
}

export interface BridgeCollapse {
  /** Next bridge column to drop. */
  next: number;
  /** Last column that drops; the player's own columns stay up. */
  last: number;
  row: number;
  countdown: number;
}

export interface Session {
  state: SessionStateName;
  world: number;
  level: number;
  lives: number;
  coins: number;
  score: number;
  timeRemaining: number;
  player: PlayerState;
  input: InputState;
  stage: World | null;
  flag: FlagSequence | null;
  bridge: BridgeCollapse | null;
  completionTicks: number;
  introTicks: number;
  victoryTicks: number;
  lastTimerSampleMs: number;
  /** Events raised outside the stage (state changes, lives) awaiting the next tick. */
  events: SimEvent[];
  readonly startLives: number;
  readonly rng: Rng;
  readonly clock: Clock;
  readonly logger: Logger;
}

export interface SessionOptions {
  rng?: Rng;
  clock?: Clock;
  logger?: Logger;
  startLives?: number;
}

export function createSession(options: SessionOptions = {}): Session {
  const clock = options.clock ?? systemClock;
  const startLives = options.startLives ?? STARTING_LIVES;
  return {
    state: 'title',
    world: 1,
    level: 1,
    lives: startLives,
    coins: 0,
    score: 0,
    timeRemaining: STAGE_TIME_SECONDS,
    player: createPlayer(),
    input: defaultInput(),
    stage: null,
    flag: null,
    bridge: null,
    completionTicks: 0,
    introTicks: 0,
    victoryTicks: 0,
    lastTimerSampleMs: clock.nowMs(),
    events: [],
    startLives,
    rng: options.rng ?? createRng(),
    clock,
    logger: options.logger ?? serviceLogger,
  };
}

export function currentStage(session: Session): World {
  if (!session.stage) {
    throw new NoStageError(session.state);
  }
  return session.stage;
}

function transition(session: Session, to: SessionStateName): void {
  const from = session.state;
  if (from === to) {
    return;
  }
  session.state = to;
  session.events.push({ type: 'stateChanged', from, to });
  session.logger.debug({ from, to }, 'session state changed');
}

function resetTimerSample(session: Session): void {
  session.lastTimerSampleMs = session.clock.nowMs();
}

export function loadStage(session: Session, world: number, level: number): World {
  const generated = generateLevel(world, level, session.rng);
  const stage = createWorld(generated, session.rng);

  session.world = world;
  session.level = level;
  session.stage = stage;
  session.timeRemaining = STAGE_TIME_SECONDS;
  session.flag = null;
  session.bridge = null;
  session.completionTicks = 0;
  respawnPlayer(session.player);
  session.player.previousJump = session.input.jump;
  resetTimerSample(session);

  stageLogger(session.logger, world, level).info(
    { theme: generated.theme, width: generated.width, spawns: generated.spawns.length },
    'stage loaded',
  );
  return stage;
}

/** Back to 1-1 with fresh counters and a small player. */
export function resetGame(session: Session): void {
  session.lives = session.startLives;
  session.coins = 0;
  session.score = 0;
  session.victoryTicks = 0;
  session.player.tier = 'small';
  loadStage(session, 1, 1);
}

export function startGame(session: Session): void {
  resetGame(session);
  session.introTicks = WORLD_INTRO_TICKS;
  transition(session, 'worldIntro');
}

export function addScore(session: Session, points: number): void {
  session.score = Math.max(0, session.score + points);
}

export function collectCoin(session: Session): void {
  session.coins += 1;
  addScore(session, SCORE_COIN);
  if (session.coins >= COINS_PER_LIFE) {
    session.coins = 0;
    session.lives += 1;
    session.stage?.texts.push(createText('1UP!', session.player.x, session.player.y - 30));
    session.events.push({ type: 'extraLife' });
  }
}

export function loseLife(session: Session): void {
  session.lives = Math.max(0, session.lives - 1);
  session.events.push({ type: 'lifeLost', livesLeft: session.lives });
  stageLogger(session.logger, session.world, session.level).info({ lives: session.lives }, 'life lost');

  if (session.lives === 0) {
    transition(session, 'gameOver');
    return;
  }
  loadStage(session, session.world, session.level);
}

export function advanceStage(session: Session): void {
  addScore(session, session.timeRemaining * TIME_BONUS_PER_SECOND);
  const advance = nextStage(session.world, session.level);
  if (advance.kind === 'victory') {
    session.victoryTicks = 0;
    transition(session, 'victory');
    session.logger.info({ score: session.score }, 'all worlds cleared');
    return;
  }
  loadStage(session, advance.world, advance.level);
  session.introTicks = WORLD_INTRO_TICKS;
  transition(session, 'worldIntro');
}

export function handleInput(session: Session, event: InputEventT): void {
  if (isHeldKey(event.action)) {
    session.input[event.action] = event.pressed;
    if (event.action === 'run' && event.pressed && session.state === 'playing' && session.stage) {
      shootFireball(session.player, session.stage);
    }
    return;
  }

  if (!event.pressed) {
    return;
  }

  switch (event.action) {
    case 'pause':
      if (session.state === 'playing') {
        transition(session, 'paused');
      } else if (session.state === 'paused') {
        resetTimerSample(session);
        transition(session, 'playing');
      }
      break;
    case 'back':
      if (session.state === 'playing' || session.state === 'paused') {
        transition(session, 'title');
      }
      break;
    case 'confirm':
      if (session.state === 'title') {
        startGame(session);
      } else if (session.state === 'gameOver' || session.state === 'victory') {
        resetGame(session);
        transition(session, 'title');
      }
      break;
  }
}

function sequenceActive(session: Session): boolean {
  return session.flag !== null || session.bridge !== null;
}

export function updateCamera(stage: World, player: PlayerState): void {
  const maxCamera = Math.max(0, stage.grid.width * TILE_SIZE - VIEWPORT_WIDTH);
  const target = Math.min(Math.max(player.x - CAMERA_LEAD, 0), maxCamera);
  const eased = stage.camera + (target - stage.camera) * CAMERA_EASE;
  stage.camera = Math.max(stage.camera, eased);
}

function stepEffects(stage: World): void {
  stage.particles = stepParticles(stage.particles);
  stage.texts = stepTexts(stage.texts);
}

function sampleTimer(session: Session, stage: World): void {
  const now = session.clock.nowMs();
  if (now - session.lastTimerSampleMs < 1000) {
    return;
  }
  session.lastTimerSampleMs = now;
  session.timeRemaining = Math.max(0, session.timeRemaining - 1);
  if (session.timeRemaining === 0) {
    killPlayer(session.player, stage, 'time');
  }
}

function startFlagSequence(session: Session, stage: World): void {
  const player = session.player;
  player.vx = 0;
  player.vy = 0;
  player.x = stage.level.flagPoleX * TILE_SIZE - TILE_SIZE / 2;
  const bonus = Math.max(
    SCORE_FLAG_ROW,
    Math.floor((VIEWPORT_HEIGHT - player.y) / TILE_SIZE) * SCORE_FLAG_ROW,
  );
  award(stage, bonus, player.x, player.y);
  session.flag = { y: FLAG_TOP_Y };
  stageLogger(session.logger, session.world, session.level).debug({ bonus }, 'flag reached');
}

function stepFlagSequence(session: Session, flag: FlagSequence, stage: World): void {
  const player = session.player;
  flag.y = Math.min(flag.y + FLAG_SLIDE_SPEED, FLAG_BOTTOM_Y);
  if (!player.onGround) {
    player.vy = FLAG_SLIDE_SPEED;
    player.y += player.vy;
    resolveVertical(player, stage);
  }
  if (flag.y >= FLAG_BOTTOM_Y) {
    session.flag = null;
    enterLevelComplete(session, stage);
  }
}

function startBridgeCollapse(session: Session, stage: World): void {
  const player = session.player;
  const { axe, bridge } = stage.level;
  if (axe) {
    stage.grid.setTile(axe.x, axe.y, 'air');
  }
  player.vx = 0;
  stageLogger(session.logger, session.world, session.level).debug('axe reached');

  if (!bridge) {
    enterLevelComplete(session, stage);
    return;
  }
  session.bridge = {
    next: bridge.start,
    last: Math.min(bridge.end, Math.floor(player.x / TILE_SIZE) - 1),
    row: bridge.row,
    countdown: BRIDGE_COLLAPSE_TICKS,
  };
}

function stepBridgeCollapse(session: Session, collapse: BridgeCollapse, stage: World): void {
  const player = session.player;
  applyGravity(player, stage.underwater);
  player.y += player.vy;
  resolveVertical(player, stage);

  collapse.countdown -= 1;
  if (collapse.countdown > 0) {
    return;
  }
  if (collapse.next <= collapse.last) {
    stage.grid.setTile(collapse.next, collapse.row, 'air');
    collapse.next += 1;
    collapse.countdown = BRIDGE_COLLAPSE_TICKS;
    return;
  }
  session.bridge = null;
  enterLevelComplete(session, stage);
}

function enterLevelComplete(session: Session, stage: World): void {
  session.completionTicks = 0;
  session.player.vx = 0;
  session.events.push({
    type: 'levelCleared',
    theme: stage.level.theme,
    world: session.world,
    level: session.level,
  });
  stageLogger(session.logger, session.world, session.level).info(
    { score: session.score, time: session.timeRemaining },
    'stage cleared',
  );
  transition(session, 'levelComplete');
}

function checkGoal(session: Session, stage: World): void {
  const player = session.player;
  const level = stage.level;

  if (level.flagPoleX >= 0 && getTheme(level.theme).params.flagPole) {
    const column = Math.floor(player.x / TILE_SIZE);
    if (Math.abs(column - level.flagPoleX) < FLAG_TRIGGER_DISTANCE) {
      startFlagSequence(session, stage);
    }
    return;
  }

  const axe = level.axe;
  if (axe && stage.grid.tileAt(axe.x, axe.y) === 'axe') {
    const axeBox = { x: axe.x * TILE_SIZE, y: axe.y * TILE_SIZE, width: TILE_SIZE, height: TILE_SIZE };
    if (overlaps(playerBox(player), axeBox)) {
      startBridgeCollapse(session, stage);
    }
  }
}

function tickPlaying(session: Session, stage: World): void {
  const player = session.player;

  if (player.dead) {
    if (stepDeath(player)) {
      loseLife(session);
    }
    return;
  }

  if (!sequenceActive(session)) {
    sampleTimer(session, stage);
    if (player.dead) {
      return;
    }
  }

  tickPlayerTimers(player);

  if (session.flag) {
    stepFlagSequence(session, session.flag, stage);
  } else if (session.bridge) {
    stepBridgeCollapse(session, session.bridge, stage);
  } else {
    stepPlayer(player, session.input, stage);
  }

  updateEntities(stage);
  resolveEntityContacts(stage);
  resolvePlayerContacts(player, stage, sequenceActive(session));
  sweepEntities(stage);
  stepEffects(stage);
  updateCamera(stage, player);

  if (session.state === 'playing' && !sequenceActive(session) && !player.dead) {
    checkGoal(session, stage);
  }
}

function tickLevelComplete(session: Session, stage: World): void {
  const player = session.player;
  session.completionTicks += 1;
  stepEffects(stage);
  if (session.completionTicks <= LEVEL_COMPLETE_HOLD_TICKS) {
    return;
  }

  player.facing = 'right';
  player.x += WALK_OFF_SPEED;
  applyGravity(player, stage.underwater);
  player.y += player.vy;
  resolveVertical(player, stage);
  updateCamera(stage, player);

  const width = stage.grid.width;
  const exitX = stage.level.theme === 'overworld' ? (width - 4) * TILE_SIZE : width * TILE_SIZE;
  if (player.x >= Math.min(exitX, stage.camera + VIEWPORT_WIDTH + WALK_OFF_MARGIN)) {
    advanceStage(session);
  }
}

function tickVictory(session: Session): void {
  session.victoryTicks += 1;
  const stage = session.stage;
  if (!stage) {
    return;
  }
  if (session.victoryTicks % FIREWORK_INTERVAL === 0) {
    stage.particles.push(...fireworks(session.rng, stage.camera, VIEWPORT_WIDTH, VIEWPORT_HEIGHT));
  }
  stepEffects(stage);
}

/** Folds stage events into the session counters and returns everything raised. */
function collectEvents(session: Session): SimEvent[] {
  if (session.stage) {
    for (const event of drainEvents(session.stage)) {
      session.events.push(event);
      if (event.type === 'score') {
        addScore(session, event.points);
      } else if (event.type === 'coin') {
        collectCoin(session);
      } else if (event.type === 'playerKilled') {
        stageLogger(session.logger, session.world, session.level).info(
          { cause: event.cause },
          'player died',
        );
      }
    }
  }
  const events = session.events;
  session.events = [];
  return events;
}

/** Advances the session by one fixed tick. */
export function tickSession(session: Session): SimEvent[] {
  switch (session.state) {
    case 'title':
    case 'paused':
    case 'gameOver':
      break;
    case 'worldIntro':
      session.introTicks -= 1;
      if (session.introTicks <= 0) {
        resetTimerSample(session);
        transition(session, 'playing');
      }
      break;
    case 'playing':
      tickPlaying(session, currentStage(session));
      break;
    case 'levelComplete':
      tickLevelComplete(session, currentStage(session));
      break;
    case 'victory':
      tickVictory(session);
      break;
  }
  return collectEvents(session);
}
