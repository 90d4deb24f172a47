import type { DiceRoller } from '../core/DiceRoller';
import { CRITICAL_DAMAGE_MULTIPLIER } from '../../config';

export interface ChanceRollResult {
  roll: number;
  chance: number;
  success: boolean;
}

export interface HitResult {
  magnitude: number;
  dodge: ChanceRollResult;
  /** null when the hit was dodged and no critical roll was made */
  critical: ChanceRollResult | null;
  /** Percentage of damage let through by protection (100 = unprotected) */
  protectionPercent: number;
  finalDamage: number;
}

export interface HitParams {
  magnitude: number;
  attackerCriticalChance: number;
  defenderDodgeChance: number;
  defenderProtectionPercent: number;
}

export class CombatResolver {
  static clampProbability(chance: number): number {
    if (Number.isNaN(chance)) return 0;
    return Math.min(1, Math.max(0, chance));
  }

  static rollChance(chance: number, roller: DiceRoller): ChanceRollResult {
    const effective = this.clampProbability(chance);
    const roll = roller.nextFloat();
    return { roll, chance: effective, success: roll < effective };
  }

  static applyCritical(damage: number): number {
    return Math.floor(damage * CRITICAL_DAMAGE_MULTIPLIER);
  }

  static applyProtection(damage: number, damagePercent: number): number {
    return Math.floor((damage * damagePercent) / 100);
  }

  /**
   * Dodge is rolled first; only a hit that lands rolls for a critical.
   * Protection applies after the critical multiplier.
   */
  static resolveHit(params: HitParams, roller: DiceRoller): HitResult {
    const dodge = this.rollChance(params.defenderDodgeChance, roller);
    if (dodge.success) {
      return {
        magnitude: params.magnitude,
        dodge,
        critical: null,
        protectionPercent: params.defenderProtectionPercent,
        finalDamage: 0,
      };
    }

    const critical = this.rollChance(params.attackerCriticalChance, roller);
    let damage = params.magnitude;
    if (critical.success) {
      damage = this.applyCritical(damage);
    }
    if (params.defenderProtectionPercent < 100) {
      damage = this.applyProtection(damage, params.defenderProtectionPercent);
    }

    return {
      magnitude: params.magnitude,
      dodge,
      critical,
      protectionPercent: params.defenderProtectionPercent,
      finalDamage: Math.max(0, damage),
    };
  }
}
