export type ActionType = 'HIT' | 'HEALING' | 'POISON' | 'PROTECTION' | 'SPECIAL';

/**
 * One combat move. `duration` is read for POISON (turns inflicted),
 * PROTECTION (turns active) and HEALING (extra turns of sustained healing);
 * every other type ignores it.
 *
 * For PROTECTION, `magnitude` is the percentage of hit damage still taken.
 */
export interface BattleAction {
  readonly name: string;
  readonly type: ActionType;
  readonly magnitude: number;
  readonly duration: number;
}

export function createAction(
  name: string,
  type: ActionType,
  magnitude: number,
  duration: number = 0
): BattleAction {
  return Object.freeze({
    name,
    type,
    magnitude: Math.max(0, Math.floor(magnitude)),
    duration: Math.max(0, Math.floor(duration)),
  });
}

export function describeAction(action: BattleAction): string {
  switch (action.type) {
    case 'HIT':
    case 'SPECIAL':
      return `${action.name} (${action.magnitude} damage)`;
    case 'POISON':
      return `${action.name} (${action.magnitude} poison for ${action.duration} turns)`;
    case 'HEALING':
      return action.duration > 0
        ? `${action.name} (+${action.magnitude} now and for ${action.duration} turns)`
        : `${action.name} (+${action.magnitude} health)`;
    case 'PROTECTION':
      return `${action.name} (${100 - action.magnitude}% less damage for ${action.duration} turns)`;
  }
}
