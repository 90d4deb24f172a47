import type { WorldImpl } from '../ecs/World';
import type { EntityId } from '../types';
import {
  type AttributesComponent,
  type CombatStatsComponent,
  type EncounterComponent,
  type ExperienceComponent,
  type HealthComponent,
  type IdentityComponent,
  type ManaComponent,
  type PositionComponent,
  type PotionsComponent,
  type PrimaryAttribute,
  type ProgressComponent,
  PRIMARY_ATTRIBUTES,
  createStatusEffects,
} from '../components';
import {
  ATTR_POINTS_PER_LEVEL,
  EXPERIENCE_PER_LEVEL,
  HUB_START,
  HUB_ZONE_ID,
  INITIAL_MANA,
  NUM_INITIAL_ATTR_POINTS,
  PLAYER_HEALING_POTIONS,
  PLAYER_POTION_HEAL_FRACTION,
} from '../../config';

export type PrimaryAttributes = Record<PrimaryAttribute, number>;

export const DEFAULT_ATTRIBUTES: PrimaryAttributes = {
  intelligence: 2,
  health: 1,
  special: 1,
  abilities: 0,
};

export interface SecondaryAttributes {
  healthPoints: number;
  mana: number;
  manaRegen: number;
  criticalChance: number;
  dodgeChance: number;
  specialDamage: number;
}

export function computeSecondaryAttributes(attrs: PrimaryAttributes): SecondaryAttributes {
  return {
    healthPoints: 1000 + 1000 * attrs.health,
    mana: 500 + 500 * attrs.intelligence,
    manaRegen: 100 + 50 * attrs.intelligence,
    criticalChance: 0.05 + 0.01 * attrs.intelligence + 0.02 * attrs.abilities,
    dodgeChance: 0.05 + 0.02 * attrs.intelligence + 0.01 * attrs.abilities,
    specialDamage: 800 + 100 * attrs.special,
  };
}

export function totalAttributePoints(attrs: PrimaryAttributes): number {
  return PRIMARY_ATTRIBUTES.reduce((sum, attr) => sum + attrs[attr], 0);
}

export function availableAttributePoints(experience: number): number {
  return NUM_INITIAL_ATTR_POINTS + Math.floor(experience / EXPERIENCE_PER_LEVEL) * ATTR_POINTS_PER_LEVEL;
}

export interface PlayerOptions {
  name: string;
  attributes?: PrimaryAttributes;
  experience?: number;
  zoneId?: string;
  x?: number;
  y?: number;
}

export interface ValidatedPlayerOptions {
  name: string;
  attributes: PrimaryAttributes;
  experience: number;
}

export class PlayerFactory {
  // Throws on a bad name or attribute spread; touches no world state
  static validateOptions(options: PlayerOptions): ValidatedPlayerOptions {
    const attrs = options.attributes ?? DEFAULT_ATTRIBUTES;
    const experience = Math.max(0, Math.floor(options.experience ?? 0));

    for (const attr of PRIMARY_ATTRIBUTES) {
      if (!Number.isInteger(attrs[attr]) || attrs[attr] < 0) {
        throw new Error(`Attribute ${attr} must be a non-negative integer, got ${attrs[attr]}`);
      }
    }
    if (totalAttributePoints(attrs) > availableAttributePoints(experience)) {
      throw new Error(
        `Attributes use ${totalAttributePoints(attrs)} points but only ${availableAttributePoints(experience)} are available`
      );
    }
    const name = options.name.trim();
    if (name === '') {
      throw new Error('Player name must not be empty');
    }
    return { name, attributes: attrs, experience };
  }

  static createPlayer(world: WorldImpl, options: PlayerOptions): EntityId {
    const { name, attributes: attrs, experience } = this.validateOptions(options);

    const derived = computeSecondaryAttributes(attrs);
    const entity = world.createEntity();

    world.addComponent<IdentityComponent>(entity, { type: 'identity', name, kind: 'player' });

    world.addComponent<AttributesComponent>(entity, { type: 'attributes', ...attrs });

    world.addComponent<HealthComponent>(entity, {
      type: 'health',
      current: derived.healthPoints,
      max: derived.healthPoints,
    });

    world.addComponent<ManaComponent>(entity, {
      type: 'mana',
      current: Math.min(INITIAL_MANA, derived.mana),
      max: derived.mana,
      regenPerTurn: derived.manaRegen,
    });

    world.addComponent<CombatStatsComponent>(entity, {
      type: 'combatStats',
      baseAttackDamage: derived.specialDamage,
      numPoisonTurns: 0,
      criticalChance: derived.criticalChance,
      dodgeChance: derived.dodgeChance,
    });

    world.addComponent<PotionsComponent>(entity, {
      type: 'potions',
      numHealingPotions: PLAYER_HEALING_POTIONS,
      originalNumHealingPotions: PLAYER_HEALING_POTIONS,
      healingPotionHealth: Math.floor(derived.healthPoints * PLAYER_POTION_HEAL_FRACTION),
    });

    world.addComponent(entity, createStatusEffects());

    world.addComponent<ExperienceComponent>(entity, { type: 'experience', total: experience });

    world.addComponent<PositionComponent>(entity, {
      type: 'position',
      zoneId: options.zoneId ?? HUB_ZONE_ID,
      x: options.x ?? HUB_START.x,
      y: options.y ?? HUB_START.y,
      facing: 'right',
    });

    world.addComponent<EncounterComponent>(entity, { type: 'encounter', stepsSinceEncounter: 0 });

    world.addComponent<ProgressComponent>(entity, {
      type: 'progress',
      keysCollected: 0,
      finalBossDefeated: false,
    });

    return entity;
  }
}
