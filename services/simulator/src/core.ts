export * from './errors';
export * from './input';
export * from './level/grid';
export * from './level/generator';
export * from './sim/clock';
export * from './sim/constants';
export * from './sim/contacts';
export * from './sim/effects';
export * from './sim/entities';
export * from './sim/events';
export * from './sim/player';
export * from './sim/rng';
export * from './sim/world';
export * from './session/session';
export * from './session/snapshot';
export * from './runner';
export * from './autopilot';
