import { InvalidStageError } from './progression';

export type Theme = 'overworld' | 'underground' | 'castle' | 'underwater';

export interface ThemeParams {
  palette: {
    bg: number;
    ground: number;
    brick: number;
    accent: number;
  };
  underground: boolean;
  underwater: boolean;
  castle: boolean;
  /** Whether the level ends at a flag pole rather than at the axe. */
  flagPole: boolean;
}

interface ThemeEntry {
  theme: Theme;
  params: ThemeParams;
}

const THEMES: ThemeEntry[] = [
  {
    theme: 'overworld',
    params: {
      palette: {
        bg: 0x5c94fc,
        ground: 0xc84c0c,
        brick: 0xc84c0c,
        accent: 0xfc9838,
      },
      underground: false,
      underwater: false,
      castle: false,
      flagPole: true,
    },
  },
  {
    theme: 'underground',
    params: {
      palette: {
        bg: 0x000000,
        ground: 0x787878,
        brick: 0xc84c0c,
        accent: 0xfc9838,
      },
      underground: true,
      underwater: false,
      castle: false,
      flagPole: true,
    },
  },
  {
    theme: 'castle',
    params: {
      palette: {
        bg: 0x000000,
        ground: 0x787878,
        brick: 0x646464,
        accent: 0xe40058,
      },
      underground: false,
      underwater: false,
      castle: true,
      flagPole: false,
    },
  },
  {
    theme: 'underwater',
    params: {
      palette: {
        bg: 0x3c64b4,
        ground: 0xc84c0c,
        brick: 0xc84c0c,
        accent: 0xff7896,
      },
      underground: false,
      underwater: true,
      castle: false,
      flagPole: true,
    },
  },
];

function copyEntry(entry: ThemeEntry): ThemeEntry {
  return {
    theme: entry.theme,
    params: {
      ...entry.params,
      palette: { ...entry.params.palette },
    },
  };
}

/**
 * Fixed classification of a stage into its theme. Level 4 of every world is a
 * castle; the second level of worlds 1 and 4 is underground, of worlds 2 and 7
 * underwater.
 */
export function classifyLevel(world: number, level: number): Theme {
  if (!Number.isInteger(world) || world < 1) {
    throw new InvalidStageError(world, level);
  }
  if (!Number.isInteger(level) || level < 1 || level > 4) {
    throw new InvalidStageError(world, level);
  }
  if (level === 4) {
    return 'castle';
  }
  if (level === 2 && (world === 1 || world === 4)) {
    return 'underground';
  }
  if (level === 2 && (world === 2 || world === 7)) {
    return 'underwater';
  }
  return 'overworld';
}

export function getTheme(name: Theme): ThemeEntry {
  const entry = THEMES.find((candidate) => candidate.theme === name);
  if (!entry) {
    throw new Error(`Unknown theme ${name}`);
  }
  return copyEntry(entry);
}
