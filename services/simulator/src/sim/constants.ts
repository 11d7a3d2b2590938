import { LEVEL_ROWS, TILE_SIZE, VIEWPORT_HEIGHT, VIEWPORT_WIDTH } from '@tilerun/game-spec';

// All speeds are pixels per tick, accelerations pixels per tick squared.
export const TICK_HZ = 60;

export const GRAVITY = 0.5;
export const MAX_FALL_SPEED = 12;
export const UNDERWATER_GRAVITY = 0.15;
export const UNDERWATER_MAX_FALL_SPEED = 2;

export const JUMP_VELOCITY = -10;
export const JUMP_CUT_VELOCITY = -3;
export const WALK_SPEED = 4;
export const RUN_SPEED = 6;
export const WALK_ACCEL = 0.2;
export const RUN_ACCEL = 0.4;
export const FRICTION = 0.15;

export const PLAYER_WIDTH = TILE_SIZE - 4;
export const SMALL_HEIGHT = TILE_SIZE;
export const BIG_HEIGHT = TILE_SIZE * 2;
export const PLAYER_SPAWN_X = TILE_SIZE * 3;
/** Ground surface of a fresh level is row 10; a small player stands in row 9. */
export const PLAYER_SPAWN_Y = (LEVEL_ROWS - 3) * TILE_SIZE;

export const STOMP_BOUNCE = -6;
export const STOMP_TOLERANCE = 10;
export const INVINCIBILITY_TICKS = 120;
export const STAR_TICKS = 600;
export const DEATH_TICKS = 180;
export const DEATH_HOP = -8;
export const DEATH_GRAVITY = GRAVITY * 0.5;
export const FALL_DEATH_Y = VIEWPORT_HEIGHT + 50;
export const ANIM_TICKS = 8;
export const ANIM_FRAMES = 3;

export const ENTITY_GRAVITY = 0.3;
export const ENTITY_MAX_FALL_SPEED = 8;
export const EMERGE_SPEED = 1;
export const COIN_RISE_VELOCITY = -10;
export const COIN_RISE_GRAVITY = 0.5;
export const STOMP_TICKS = 30;
export const WALKER_SPEED = 1;
export const PICKUP_SPEED = 2;
export const SHELL_SPEED = 8;
export const KICK_GRACE_TICKS = 10;
export const STAR_BOUNCE = -5;
export const FIREBALL_SPEED = 8;
export const FIREBALL_BOUNCE = -4;
export const FIREBALL_SIZE = 12;
export const MAX_FIREBALLS = 2;
export const BOWSER_HIT_POINTS = 5;
export const CLIFF_LOOKAHEAD = 4;
export const POWERUP_CHANCE = 0.25;

export const CULL_MARGIN = 100;
export const SPAWN_MARGIN = 64;
export const BELOW_LEVEL_Y = VIEWPORT_HEIGHT + 64;

export const PARTICLE_LIFE = 60;
export const PARTICLE_GRAVITY = 0.3;
export const TEXT_LIFE = 60;

export const WORLD_INTRO_TICKS = 180;
export const LEVEL_COMPLETE_HOLD_TICKS = 60;
export const WALK_OFF_SPEED = 2;
export const WALK_OFF_MARGIN = 50;
export const FLAG_SLIDE_SPEED = 3;
export const FLAG_TRIGGER_DISTANCE = 1.5;
export const FLAG_TOP_Y = TILE_SIZE * 2;
export const FLAG_BOTTOM_Y = VIEWPORT_HEIGHT - TILE_SIZE * 3;
export const BRIDGE_COLLAPSE_TICKS = 4;
export const FIREWORK_INTERVAL = 20;
export const CAMERA_LEAD = VIEWPORT_WIDTH / 3;
export const CAMERA_EASE = 0.1;

export const SCORE_QUESTION = 100;
export const SCORE_BRICK = 50;
export const SCORE_COIN = 200;
export const SCORE_POWERUP = 1000;
export const SCORE_STOMP = 100;
export const SCORE_KILL = 200;
export const SCORE_FLAG_ROW = 100;
export const TIME_BONUS_PER_SECOND = 50;
export const COINS_PER_LIFE = 100;

export const COLOR_BRICK = 0xc84c0c;
export const COLOR_WHITE = 0xffffff;
