import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import type { DiceRoller } from '../core/DiceRoller';
import type { EntityId } from '../types';
import type { BattleAction } from '../actions/Action';
import type { PlayerActionDefinition } from '../data/PlayerActions';
import {
  type AttributesComponent,
  type CombatStatsComponent,
  type EnemyComponent,
  type HealthComponent,
  type IdentityComponent,
  type PotionsComponent,
  type StatusEffectsComponent,
  hasHealingEffect,
  hasPoisonEffect,
  hasProtectionEffect,
} from '../components';
import { CombatResolver, type HitResult } from './CombatResolver';
import { DamageSystem } from './DamageSystem';
import { StatusEffectSystem } from './StatusEffectSystem';
import { ManaSystem } from './ManaSystem';
import { EnemyPolicySystem } from './EnemyPolicySystem';

export type BattlePhase = 'awaitingPlayerInput' | 'resolvingTurn' | 'playerDefeated' | 'enemyDefeated';
export type TurnStatus = 'continue' | 'playerDefeated' | 'enemyDefeated';
export type BattleOutcome = Exclude<TurnStatus, 'continue'>;

export interface BattleReport {
  outcome: BattleOutcome;
  experienceGained: number;
}

export interface BattleContext {
  playerId: EntityId;
  enemyId: EntityId;
  turn: number;
}

export interface ActionOutcome {
  actorId: EntityId;
  targetId: EntityId;
  action: BattleAction;
  /** Dodge/critical detail, present for HIT and SPECIAL */
  hit: HitResult | null;
  damage: number;
  healed: number;
}

export interface TurnResult {
  status: TurnStatus;
  playerOutcome: ActionOutcome;
  /** null when the enemy fell before it could act */
  enemyOutcome: ActionOutcome | null;
  report: BattleReport | null;
}

export class BattleSystem {
  /**
   * Prepares the player for a fresh battle: full health, starting mana,
   * restocked potions and no lingering effects.
   */
  static startBattle(
    world: WorldImpl,
    eventBus: EventBusImpl,
    playerId: EntityId,
    enemyId: EntityId,
    turn: number
  ): void {
    const health = world.requireComponent<HealthComponent>(playerId, 'health');
    world.addComponent<HealthComponent>(playerId, { ...health, current: health.max });

    ManaSystem.resetForBattle(world, playerId);

    const potions = world.getComponent<PotionsComponent>(playerId, 'potions');
    if (potions) {
      world.addComponent<PotionsComponent>(playerId, {
        ...potions,
        numHealingPotions: potions.originalNumHealingPotions,
      });
    }
    StatusEffectSystem.clearEffects(world, playerId);

    const enemy = world.requireComponent<EnemyComponent>(enemyId, 'enemy');
    const enemyHealth = world.requireComponent<HealthComponent>(enemyId, 'health');
    const enemyIdentity = world.getComponent<IdentityComponent>(enemyId, 'identity');

    eventBus.emit({
      type: 'BattleStarted',
      turn,
      timestamp: Date.now(),
      entityId: playerId,
      targetId: enemyId,
      data: {
        archetype: enemy.archetype,
        enemyName: enemyIdentity?.name ?? enemy.archetype,
        enemyHealth: enemyHealth.max,
      },
    });
  }

  /**
   * Reasons the player may not use `action` right now; empty when allowed.
   */
  static validatePlayerAction(
    world: WorldImpl,
    playerId: EntityId,
    enemyId: EntityId,
    action: PlayerActionDefinition
  ): string[] {
    const reasons: string[] = [];
    const attributes = world.getComponent<AttributesComponent>(playerId, 'attributes');
    const potions = world.getComponent<PotionsComponent>(playerId, 'potions');
    const playerEffects = world.getComponent<StatusEffectsComponent>(playerId, 'statusEffects');
    const enemyEffects = world.getComponent<StatusEffectsComponent>(enemyId, 'statusEffects');

    if ((attributes?.abilities ?? 0) < action.requiredAbilityPoints) {
      reasons.push(`${action.requiredAbilityPoints} ability points required`);
    }
    if (!ManaSystem.canAfford(world, playerId, action.manaCost)) {
      reasons.push('not enough mana');
    }
    if (action.usesPotion && (potions?.numHealingPotions ?? 0) <= 0) {
      reasons.push('no healing potions left');
    }
    if (action.type === 'POISON' && hasPoisonEffect(enemyEffects)) {
      reasons.push('enemy already poisoned');
    }
    const isLastingEffect =
      action.type === 'PROTECTION' || (action.type === 'HEALING' && action.duration > 0);
    if (isLastingEffect && (hasProtectionEffect(playerEffects) || hasHealingEffect(playerEffects))) {
      reasons.push('cannot stack effects');
    }
    return reasons;
  }

  /**
   * Resolves one full turn.
   *
   * The enemy picks its move from the state before anything happens. The
   * player's action lands first; if that defeats the enemy the turn ends
   * there. Otherwise the enemy acts, then both sides' effects tick (enemy
   * first) and the player regains mana. A player defeat wins ties.
   */
  static resolveTurn(
    world: WorldImpl,
    eventBus: EventBusImpl,
    roller: DiceRoller,
    context: BattleContext,
    playerAction: PlayerActionDefinition
  ): TurnResult {
    const { playerId, enemyId, turn } = context;

    const reasons = this.validatePlayerAction(world, playerId, enemyId, playerAction);
    if (reasons.length > 0) {
      throw new Error(`Invalid player action ${playerAction.name}: ${reasons.join(', ')}`);
    }

    const enemyAction = EnemyPolicySystem.decideAction(world, eventBus, roller, enemyId, playerId, turn);

    this.payForPlayerAction(world, eventBus, playerId, playerAction, turn);
    const playerOutcome = this.applyAction(world, eventBus, roller, playerId, enemyId, playerAction, turn);

    if (DamageSystem.isDefeated(world, enemyId)) {
      return this.finish(world, eventBus, context, 'enemyDefeated', playerOutcome, null);
    }

    const enemyOutcome = this.applyAction(world, eventBus, roller, enemyId, playerId, enemyAction, turn);

    if (DamageSystem.isDefeated(world, playerId)) {
      return this.finish(world, eventBus, context, 'playerDefeated', playerOutcome, enemyOutcome);
    }

    StatusEffectSystem.tickEndOfTurn(world, eventBus, enemyId, turn);
    StatusEffectSystem.tickEndOfTurn(world, eventBus, playerId, turn);
    ManaSystem.regenerate(world, eventBus, playerId, turn);

    let status: TurnStatus = 'continue';
    if (DamageSystem.isDefeated(world, playerId)) {
      status = 'playerDefeated';
    } else if (DamageSystem.isDefeated(world, enemyId)) {
      status = 'enemyDefeated';
    }
    return this.finish(world, eventBus, context, status, playerOutcome, enemyOutcome);
  }

  private static payForPlayerAction(
    world: WorldImpl,
    eventBus: EventBusImpl,
    playerId: EntityId,
    action: PlayerActionDefinition,
    turn: number
  ): void {
    ManaSystem.spendMana(world, eventBus, playerId, action.manaCost, turn);

    if (action.usesPotion) {
      const potions = world.requireComponent<PotionsComponent>(playerId, 'potions');
      const remaining = potions.numHealingPotions - 1;
      world.addComponent<PotionsComponent>(playerId, { ...potions, numHealingPotions: remaining });
      eventBus.emit({
        type: 'PotionUsed',
        turn,
        timestamp: Date.now(),
        entityId: playerId,
        data: { potionsRemaining: remaining },
      });
    }

    eventBus.emit({
      type: 'PlayerActionChosen',
      turn,
      timestamp: Date.now(),
      entityId: playerId,
      data: {
        name: action.name,
        actionType: action.type,
        magnitude: action.magnitude,
        duration: action.duration,
        manaCost: action.manaCost,
      },
    });
  }

  // Offensive actions land on the opponent, the rest on the actor
  private static applyAction(
    world: WorldImpl,
    eventBus: EventBusImpl,
    roller: DiceRoller,
    actorId: EntityId,
    opponentId: EntityId,
    action: BattleAction,
    turn: number
  ): ActionOutcome {
    switch (action.type) {
      case 'HIT':
      case 'SPECIAL': {
        const hit = this.performHit(world, eventBus, roller, actorId, opponentId, action, turn);
        const damage = hit.dodge.success
          ? 0
          : DamageSystem.applyDamage(world, eventBus, opponentId, hit.finalDamage, turn, 'hit', actorId);
        return { actorId, targetId: opponentId, action, hit, damage, healed: 0 };
      }
      case 'POISON':
        StatusEffectSystem.inflictPoison(
          world,
          eventBus,
          opponentId,
          action.magnitude,
          action.duration,
          turn,
          actorId
        );
        return { actorId, targetId: opponentId, action, hit: null, damage: 0, healed: 0 };
      case 'HEALING': {
        const healed = DamageSystem.applyHealing(world, eventBus, actorId, action.magnitude, turn, action.name);
        if (action.duration > 0) {
          StatusEffectSystem.applySustainedHealing(
            world,
            eventBus,
            actorId,
            action.magnitude,
            action.duration,
            turn
          );
        }
        return { actorId, targetId: actorId, action, hit: null, damage: 0, healed };
      }
      case 'PROTECTION':
        StatusEffectSystem.applyProtection(world, eventBus, actorId, action.magnitude, action.duration, turn);
        return { actorId, targetId: actorId, action, hit: null, damage: 0, healed: 0 };
    }
  }

  private static performHit(
    world: WorldImpl,
    eventBus: EventBusImpl,
    roller: DiceRoller,
    attackerId: EntityId,
    defenderId: EntityId,
    action: BattleAction,
    turn: number
  ): HitResult {
    const attackerStats = world.requireComponent<CombatStatsComponent>(attackerId, 'combatStats');
    const defenderStats = world.requireComponent<CombatStatsComponent>(defenderId, 'combatStats');

    const hit = CombatResolver.resolveHit(
      {
        magnitude: action.magnitude,
        attackerCriticalChance: attackerStats.criticalChance,
        defenderDodgeChance: defenderStats.dodgeChance,
        defenderProtectionPercent: StatusEffectSystem.getProtectionPercent(world, defenderId),
      },
      roller
    );

    if (hit.dodge.success) {
      eventBus.emit({
        type: 'AttackDodged',
        turn,
        timestamp: Date.now(),
        entityId: attackerId,
        targetId: defenderId,
        data: { action: action.name, roll: hit.dodge.roll, chance: hit.dodge.chance },
      });
    } else if (hit.critical?.success) {
      eventBus.emit({
        type: 'CriticalHit',
        turn,
        timestamp: Date.now(),
        entityId: attackerId,
        targetId: defenderId,
        data: { action: action.name, roll: hit.critical.roll, chance: hit.critical.chance },
      });
    }
    return hit;
  }

  private static finish(
    world: WorldImpl,
    eventBus: EventBusImpl,
    context: BattleContext,
    status: TurnStatus,
    playerOutcome: ActionOutcome,
    enemyOutcome: ActionOutcome | null
  ): TurnResult {
    const { playerId, enemyId, turn } = context;
    eventBus.emit({
      type: 'TurnEnded',
      turn,
      timestamp: Date.now(),
      entityId: playerId,
      targetId: enemyId,
      data: { status },
    });

    if (status === 'continue') {
      return { status, playerOutcome, enemyOutcome, report: null };
    }

    const report: BattleReport = {
      outcome: status,
      experienceGained:
        status === 'enemyDefeated' ? EnemyPolicySystem.getExperienceGainOnDeath(world, enemyId) : 0,
    };
    eventBus.emit({
      type: 'BattleEnded',
      turn,
      timestamp: Date.now(),
      entityId: playerId,
      targetId: enemyId,
      data: { outcome: report.outcome, experienceGained: report.experienceGained },
    });
    return { status, playerOutcome, enemyOutcome, report };
  }
}
