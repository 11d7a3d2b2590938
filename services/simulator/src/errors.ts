export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationError';
  }
}

/** A level grid whose shape breaks the one-viewport-tall contract. */
export class LevelShapeError extends SimulationError {
  constructor(
    message: string,
    public readonly details: { width?: number; height: number; expectedHeight?: number },
  ) {
    super(message);
    this.name = 'LevelShapeError';
  }
}

/** The session was asked to play without a loaded stage. */
export class NoStageError extends SimulationError {
  constructor(state: string) {
    super(`No stage loaded while ${state}`);
    this.name = 'NoStageError';
  }
}
