import type { Component } from '../types';

// Who the entity is (display name and side)
export interface IdentityComponent extends Component {
  type: 'identity';
  name: string;
  kind: 'player' | 'enemy';
}

// Health; 0 <= current <= max
export interface HealthComponent extends Component {
  type: 'health';
  current: number;
  max: number;
}

// Combat figures shared by the player and every enemy. Chances are stored as
// computed and clamped when rolled.
export interface CombatStatsComponent extends Component {
  type: 'combatStats';
  /** Player: Special Attack damage. Enemy: damage of its base move. */
  baseAttackDamage: number;
  /** Duration of the poison this entity inflicts (0 for the player) */
  numPoisonTurns: number;
  criticalChance: number;
  dodgeChance: number;
}

export interface PotionsComponent extends Component {
  type: 'potions';
  numHealingPotions: number;
  originalNumHealingPotions: number;
  healingPotionHealth: number;
}

export interface PoisonEffect {
  damagePerTurn: number;
  turnsRemaining: number;
}

export interface ProtectionEffect {
  /** Percentage of incoming hit damage still taken */
  damagePercent: number;
  turnsRemaining: number;
}

export interface HealingEffect {
  healthPerTurn: number;
  turnsRemaining: number;
}

export interface StatusEffectsComponent extends Component {
  type: 'statusEffects';
  poison: PoisonEffect;
  protection: ProtectionEffect;
  healing: HealingEffect;
}

// --- Player only ---

export type PrimaryAttribute = 'intelligence' | 'health' | 'special' | 'abilities';

export const PRIMARY_ATTRIBUTES: readonly PrimaryAttribute[] = [
  'intelligence',
  'health',
  'special',
  'abilities',
];

export interface AttributesComponent extends Component {
  type: 'attributes';
  intelligence: number;
  health: number;
  special: number;
  abilities: number;
}

export interface ManaComponent extends Component {
  type: 'mana';
  current: number;
  max: number;
  regenPerTurn: number;
}

export interface ExperienceComponent extends Component {
  type: 'experience';
  total: number;
}

export interface PositionComponent extends Component {
  type: 'position';
  zoneId: string;
  x: number; // column, 0 = left
  y: number; // row, 0 = top
  facing: 'left' | 'right';
}

// Steps walked since the last random encounter
export interface EncounterComponent extends Component {
  type: 'encounter';
  stepsSinceEncounter: number;
}

export interface ProgressComponent extends Component {
  type: 'progress';
  keysCollected: number;
  finalBossDefeated: boolean;
}

// --- Enemy only ---

export type EnemyArchetypeId = 'randomEncounter' | 'mainEnemy' | 'boss' | 'finalBoss';

export interface EnemyComponent extends Component {
  type: 'enemy';
  archetype: EnemyArchetypeId;
  /** Player experience the stats were rolled from, after clamping */
  playerExperience: number;
}

// --- Zones ---

export interface ZoneStateComponent extends Component {
  type: 'zoneState';
  zoneId: string;
  enemiesRemaining: number;
  bossUnlocked: boolean;
  /** "x,y" keys of tiles that have been used up */
  clearedTiles: string[];
}

export function tileKey(x: number, y: number): string {
  return `${x},${y}`;
}

// --- Helpers ---

export function createStatusEffects(): StatusEffectsComponent {
  return {
    type: 'statusEffects',
    poison: { damagePerTurn: 0, turnsRemaining: 0 },
    protection: { damagePercent: 100, turnsRemaining: 0 },
    healing: { healthPerTurn: 0, turnsRemaining: 0 },
  };
}

export function hasPoisonEffect(effects: StatusEffectsComponent | undefined): boolean {
  return (effects?.poison.turnsRemaining ?? 0) > 0;
}

export function hasProtectionEffect(effects: StatusEffectsComponent | undefined): boolean {
  return (effects?.protection.turnsRemaining ?? 0) > 0;
}

export function hasHealingEffect(effects: StatusEffectsComponent | undefined): boolean {
  return (effects?.healing.turnsRemaining ?? 0) > 0;
}

export function isDefeated(health: HealthComponent): boolean {
  return health.current <= 0;
}
