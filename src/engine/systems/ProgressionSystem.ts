import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import type { EntityId } from '../types';
import type {
  AttributesComponent,
  CombatStatsComponent,
  ExperienceComponent,
  HealthComponent,
  ManaComponent,
  PotionsComponent,
  PrimaryAttribute,
} from '../components';
import {
  type PrimaryAttributes,
  availableAttributePoints,
  computeSecondaryAttributes,
  totalAttributePoints,
} from '../data/PlayerFactory';
import { EXPERIENCE_PER_LEVEL, PLAYER_POTION_HEAL_FRACTION } from '../../config';

function toPrimary(attrs: AttributesComponent): PrimaryAttributes {
  return {
    intelligence: attrs.intelligence,
    health: attrs.health,
    special: attrs.special,
    abilities: attrs.abilities,
  };
}

export class ProgressionSystem {
  static getLevel(experience: number): number {
    return Math.floor(Math.max(0, experience) / EXPERIENCE_PER_LEVEL) + 1;
  }

  static experienceToNextLevel(experience: number): number {
    return EXPERIENCE_PER_LEVEL - (Math.max(0, experience) % EXPERIENCE_PER_LEVEL);
  }

  static getUnspentAttributePoints(attributes: PrimaryAttributes, experience: number): number {
    return availableAttributePoints(experience) - totalAttributePoints(attributes);
  }

  /**
   * Adds experience, clamped to a non-negative integer. Returns the amount
   * actually added.
   */
  static addExperience(
    world: WorldImpl,
    eventBus: EventBusImpl,
    playerId: EntityId,
    amount: number,
    turn: number
  ): number {
    const gained = Number.isFinite(amount) ? Math.max(0, Math.floor(amount)) : 0;
    const experience = world.requireComponent<ExperienceComponent>(playerId, 'experience');
    const previousLevel = this.getLevel(experience.total);
    const total = experience.total + gained;
    world.addComponent<ExperienceComponent>(playerId, { ...experience, total });

    eventBus.emit({
      type: 'ExperienceGained',
      turn,
      timestamp: Date.now(),
      entityId: playerId,
      data: { amount: gained, total },
    });

    const level = this.getLevel(total);
    if (level > previousLevel) {
      eventBus.emit({
        type: 'LevelUp',
        turn,
        timestamp: Date.now(),
        entityId: playerId,
        data: {
          level,
          previousLevel,
          unspentPoints: this.getUnspentAttributePoints(
            toPrimary(world.requireComponent<AttributesComponent>(playerId, 'attributes')),
            total
          ),
        },
      });
    }
    return gained;
  }

  // Returns false when there are no points left to spend
  static spendAttributePoint(
    world: WorldImpl,
    eventBus: EventBusImpl,
    playerId: EntityId,
    attribute: PrimaryAttribute,
    turn: number
  ): boolean {
    const attrs = world.requireComponent<AttributesComponent>(playerId, 'attributes');
    const experience = world.requireComponent<ExperienceComponent>(playerId, 'experience');
    if (this.getUnspentAttributePoints(toPrimary(attrs), experience.total) <= 0) {
      return false;
    }

    const newValue = attrs[attribute] + 1;
    world.addComponent<AttributesComponent>(playerId, { ...attrs, [attribute]: newValue });
    this.recomputeDerivedStats(world, playerId);

    eventBus.emit({
      type: 'AttributePointSpent',
      turn,
      timestamp: Date.now(),
      entityId: playerId,
      data: { attribute, value: newValue },
    });
    return true;
  }

  /**
   * Rebuilds health, mana, combat stats and potion strength from the primary
   * attributes. Current health and mana move up by however much their
   * maximum grew.
   */
  static recomputeDerivedStats(world: WorldImpl, playerId: EntityId): void {
    const attrs = world.requireComponent<AttributesComponent>(playerId, 'attributes');
    const derived = computeSecondaryAttributes(toPrimary(attrs));

    const health = world.requireComponent<HealthComponent>(playerId, 'health');
    const healthGrowth = Math.max(0, derived.healthPoints - health.max);
    world.addComponent<HealthComponent>(playerId, {
      ...health,
      max: derived.healthPoints,
      current: Math.min(derived.healthPoints, health.current + healthGrowth),
    });

    const mana = world.requireComponent<ManaComponent>(playerId, 'mana');
    const manaGrowth = Math.max(0, derived.mana - mana.max);
    world.addComponent<ManaComponent>(playerId, {
      ...mana,
      max: derived.mana,
      current: Math.min(derived.mana, mana.current + manaGrowth),
      regenPerTurn: derived.manaRegen,
    });

    const stats = world.requireComponent<CombatStatsComponent>(playerId, 'combatStats');
    world.addComponent<CombatStatsComponent>(playerId, {
      ...stats,
      baseAttackDamage: derived.specialDamage,
      criticalChance: derived.criticalChance,
      dodgeChance: derived.dodgeChance,
    });

    const potions = world.getComponent<PotionsComponent>(playerId, 'potions');
    if (potions) {
      world.addComponent<PotionsComponent>(playerId, {
        ...potions,
        healingPotionHealth: Math.floor(derived.healthPoints * PLAYER_POTION_HEAL_FRACTION),
      });
    }
  }
}
