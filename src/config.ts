// Game tuning and runtime defaults

// Exploration
export const GRID_SIZE = 9;
export const HUB_ZONE_ID = 'GREEN_HUB';
export const HUB_START = { x: 4, y: 4 } as const;
export const RANDOM_ENCOUNTER_MIN_STEPS = 4;
export const RANDOM_ENCOUNTER_THRESHOLD = 8; // D100 roll at or below triggers
export const KEYS_REQUIRED = 4;

// Player
export const INITIAL_MANA = 500;
export const NUM_INITIAL_ATTR_POINTS = 4;
export const EXPERIENCE_PER_LEVEL = 50;
export const ATTR_POINTS_PER_LEVEL = 2;
export const PLAYER_HEALING_POTIONS = 2;
export const PLAYER_POTION_HEAL_FRACTION = 0.25;

// Combat
export const CRITICAL_DAMAGE_MULTIPLIER = 1.5;
export const POISON_DAMAGE_MULTIPLIER = 0.5;

// Console sessions keep only the latest events
export const CONSOLE_EVENT_HISTORY = 1000;

export interface GameConfig {
  seed: number;
  playerName: string;
  tickInterval: number;
  refreshInterval: number;
  logLevel: string;
  logDir: string;
  logToFile: boolean;
}

export const DEFAULT_CONFIG: GameConfig = {
  seed: Date.now() % 2147483647,
  playerName: 'Mage',
  tickInterval: 100,
  refreshInterval: 250,
  logLevel: 'info',
  logDir: 'logs',
  logToFile: false,
};
