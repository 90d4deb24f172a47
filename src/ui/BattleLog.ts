import type { EntityId, GameEvent, GameEventType } from '../engine/types';

export type LogSink = (line: string) => void;

const LOGGED_EVENTS: GameEventType[] = [
  'BattleStarted',
  'PlayerActionChosen',
  'EnemyActionChosen',
  'PotionUsed',
  'AttackDodged',
  'CriticalHit',
  'DamageDealt',
  'HealthRestored',
  'PoisonInflicted',
  'PoisonDamage',
  'PoisonExpired',
  'ProtectionApplied',
  'ProtectionExpired',
  'SustainedHealingApplied',
  'SustainedHealingExpired',
  'UnitDefeated',
  'BattleEnded',
  'ExperienceGained',
  'LevelUp',
];

function num(data: Record<string, unknown>, key: string): number {
  const value = data[key];
  return typeof value === 'number' ? value : 0;
}

function str(data: Record<string, unknown>, key: string): string {
  const value = data[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Turns battle events into one-line text for a console. Names are looked up
 * through `getEntityName` at format time; the enemy of each battle is
 * remembered from its BattleStarted event until the battle ends.
 */
export class BattleLog {
  private maxEntries = 50;
  private entries: string[] = [];
  private entityNames: Map<EntityId, string> = new Map();
  private getEntityName: (id: EntityId) => string;

  constructor(
    private readonly sink: LogSink | null = null,
    getEntityName?: (id: EntityId) => string | undefined
  ) {
    this.getEntityName = (id) => this.entityNames.get(id) ?? getEntityName?.(id) ?? id;
  }

  setEntityName(id: EntityId, name: string): void {
    this.entityNames.set(id, name);
  }

  subscribeToEvents(subscribe: (type: GameEventType, fn: (e: GameEvent) => void) => () => void): () => void {
    const unsubscribers = LOGGED_EVENTS.map((type) => subscribe(type, (e) => this.onEvent(e)));
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  getEntries(): string[] {
    return [...this.entries];
  }

  onEvent(event: GameEvent): void {
    const enemyName = str(event.data, 'enemyName');
    if (event.type === 'BattleStarted' && event.targetId && enemyName) {
      this.setEntityName(event.targetId, enemyName);
    }

    const line = this.formatEvent(event);
    if (!line) return;

    const entry = `[T${event.turn}] ${line}`;
    this.entries.push(entry);
    while (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
    this.sink?.(entry);

    if (event.type === 'BattleEnded' && event.targetId) {
      this.entityNames.delete(event.targetId);
    }
  }

  formatEvent(event: GameEvent): string {
    const data = event.data;
    const who = event.entityId ? this.getEntityName(event.entityId) : '?';
    const target = event.targetId ? this.getEntityName(event.targetId) : '?';

    switch (event.type) {
      case 'BattleStarted':
        return `A battle begins against ${str(data, 'enemyName')} (${num(data, 'enemyHealth')} HP)`;
      case 'PlayerActionChosen':
      case 'EnemyActionChosen':
        return `${who} uses ${str(data, 'name')}`;
      case 'PotionUsed':
        return `${who} drinks a potion (${num(data, 'potionsRemaining')} left)`;
      case 'AttackDodged':
        return `${target} dodges ${str(data, 'action')}`;
      case 'CriticalHit':
        return `Critical hit by ${who}!`;
      case 'DamageDealt':
        return `${who} deals ${num(data, 'damage')} damage to ${target}; HP: ${num(data, 'newHealth')}`;
      case 'HealthRestored':
        return `${who} recovers ${num(data, 'restored')} health; HP: ${num(data, 'newHealth')}`;
      case 'PoisonInflicted':
        return `${target} is poisoned for ${num(data, 'turns')} turns`;
      case 'PoisonDamage':
        return `${who} takes ${num(data, 'damage')} poison damage; HP: ${num(data, 'newHealth')}`;
      case 'PoisonExpired':
        return `${who} is no longer poisoned`;
      case 'ProtectionApplied':
        return `${who} is protected for ${num(data, 'turns')} turns`;
      case 'ProtectionExpired':
        return `${who}'s protection fades`;
      case 'SustainedHealingApplied':
        return `${who} will heal ${num(data, 'healthPerTurn')} per turn for ${num(data, 'turns')} turns`;
      case 'SustainedHealingExpired':
        return `${who}'s healing wears off`;
      case 'UnitDefeated':
        return `${who} falls`;
      case 'BattleEnded':
        return str(data, 'outcome') === 'enemyDefeated' ? 'Victory!' : 'Defeat...';
      case 'ExperienceGained':
        return `${who} gains ${num(data, 'amount')} experience (${num(data, 'total')} total)`;
      case 'LevelUp':
        return `${who} reaches level ${num(data, 'level')}!`;
      default:
        return '';
    }
  }
}
