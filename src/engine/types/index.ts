// Entity is just a string ID
export type EntityId = string;

// Base component interface - all components must have a type
export interface Component {
  readonly type: string;
}

// Forward declaration for World (implemented in ecs/)
export interface World {
  createEntity(): EntityId;
  removeEntity(entityId: EntityId): void;
  addComponent<T extends Component>(entityId: EntityId, component: T): void;
  getComponent<T extends Component>(entityId: EntityId, type: T['type']): T | undefined;
  hasComponent(entityId: EntityId, type: string): boolean;
  removeComponent(entityId: EntityId, type: string): void;
  query(...componentTypes: string[]): EntityId[];
  getAllEntities(): EntityId[];
  clear(): void;
}

// Game event types
export type GameEventType =
  | 'GameStarted'
  | 'BattleStarted'
  | 'TurnStarted'
  | 'PlayerActionChosen'
  | 'PlayerActionRejected'
  | 'EnemyActionChosen'
  | 'PotionUsed'
  | 'ManaSpent'
  | 'ManaRegenerated'
  | 'AttackDodged'
  | 'CriticalHit'
  | 'DamageDealt'
  | 'HealthRestored'
  | 'PoisonInflicted'
  | 'PoisonDamage'
  | 'PoisonExpired'
  | 'ProtectionApplied'
  | 'ProtectionExpired'
  | 'SustainedHealingApplied'
  | 'SustainedHealingExpired'
  | 'UnitDefeated'
  | 'TurnEnded'
  | 'BattleEnded'
  | 'ExperienceGained'
  | 'LevelUp'
  | 'AttributePointSpent'
  | 'PlayerMoved'
  | 'MovementBlocked'
  | 'ZoneChanged'
  | 'RandomEncounter'
  | 'TileCleared'
  | 'BossUnlocked'
  | 'KeyCollected'
  | 'FinalBossSummoned'
  | 'PlayerDied'
  | 'PlayerReturnedToHub'
  | 'GameWon';

// Game event structure
export interface GameEvent {
  type: GameEventType;
  turn: number;
  timestamp: number;
  entityId?: EntityId;
  targetId?: EntityId;
  data: Record<string, unknown>;
}
