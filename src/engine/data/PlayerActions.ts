import { type ActionType, type BattleAction, createAction } from '../actions/Action';

export interface PlayerActionDefinition extends BattleAction {
  readonly manaCost: number;
  readonly requiredAbilityPoints: number;
  readonly usesPotion: boolean;
}

// Magnitude is filled from the player's own stats when the action is used
export type PlayerStatMagnitude = 'baseAttackDamage' | 'healingPotionHealth';

interface PlayerActionTemplate {
  name: string;
  type: ActionType;
  magnitude: number | PlayerStatMagnitude;
  duration: number;
  manaCost: number;
  requiredAbilityPoints: number;
  usesPotion?: boolean;
}

export const PLAYER_ACTION_TEMPLATES: readonly PlayerActionTemplate[] = [
  { name: 'Weak Hit', type: 'HIT', magnitude: 300, duration: 0, manaCost: 0, requiredAbilityPoints: 0 },
  { name: 'Medium Hit', type: 'HIT', magnitude: 500, duration: 0, manaCost: 150, requiredAbilityPoints: 1 },
  { name: 'Strong Hit', type: 'HIT', magnitude: 900, duration: 0, manaCost: 400, requiredAbilityPoints: 4 },
  { name: 'Weak Poison', type: 'POISON', magnitude: 100, duration: 3, manaCost: 0, requiredAbilityPoints: 0 },
  { name: 'Medium Poison', type: 'POISON', magnitude: 150, duration: 4, manaCost: 300, requiredAbilityPoints: 3 },
  { name: 'Strong Poison', type: 'POISON', magnitude: 200, duration: 5, manaCost: 600, requiredAbilityPoints: 10 },
  { name: 'Weak Healing', type: 'HEALING', magnitude: 250, duration: 0, manaCost: 200, requiredAbilityPoints: 0 },
  { name: 'Strong Healing', type: 'HEALING', magnitude: 500, duration: 0, manaCost: 500, requiredAbilityPoints: 6 },
  { name: 'Sustained Healing', type: 'HEALING', magnitude: 500, duration: 4, manaCost: 700, requiredAbilityPoints: 8 },
  { name: 'Weak Protection', type: 'PROTECTION', magnitude: 50, duration: 3, manaCost: 200, requiredAbilityPoints: 0 },
  { name: 'Strong Protection', type: 'PROTECTION', magnitude: 50, duration: 5, manaCost: 500, requiredAbilityPoints: 5 },
  { name: 'Special Attack', type: 'SPECIAL', magnitude: 'baseAttackDamage', duration: 0, manaCost: 1000, requiredAbilityPoints: 0 },
  {
    name: 'Healing Potion',
    type: 'HEALING',
    magnitude: 'healingPotionHealth',
    duration: 0,
    manaCost: 0,
    requiredAbilityPoints: 0,
    usesPotion: true,
  },
];

export interface PlayerStats {
  baseAttackDamage: number;
  healingPotionHealth: number;
}

function buildAction(template: PlayerActionTemplate, stats: PlayerStats): PlayerActionDefinition {
  const magnitude =
    typeof template.magnitude === 'number' ? template.magnitude : stats[template.magnitude];
  const action = createAction(template.name, template.type, magnitude, template.duration);
  return Object.freeze({
    ...action,
    manaCost: template.manaCost,
    requiredAbilityPoints: template.requiredAbilityPoints,
    usesPotion: template.usesPotion ?? false,
  });
}

// Full catalog for a player with the given stats, in menu order
export function getPlayerActions(stats: PlayerStats): PlayerActionDefinition[] {
  return PLAYER_ACTION_TEMPLATES.map((t) => buildAction(t, stats));
}

export function findPlayerAction(
  name: string,
  stats: PlayerStats
): PlayerActionDefinition | undefined {
  const wanted = name.trim().toLowerCase();
  const template = PLAYER_ACTION_TEMPLATES.find((t) => t.name.toLowerCase() === wanted);
  return template ? buildAction(template, stats) : undefined;
}
