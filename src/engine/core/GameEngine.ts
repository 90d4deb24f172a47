import { WorldImpl } from '../ecs/World';
import { DiceRoller, type DiceState } from './DiceRoller';
import { EventBusImpl, type GameEventListener } from './EventBus';
import type { Component, EntityId, GameEvent, GameEventType } from '../types';
import {
  type AttributesComponent,
  type CombatStatsComponent,
  type EncounterComponent,
  type EnemyArchetypeId,
  type ExperienceComponent,
  type HealthComponent,
  type IdentityComponent,
  type ManaComponent,
  type PositionComponent,
  type PotionsComponent,
  type PrimaryAttribute,
  type ProgressComponent,
  type StatusEffectsComponent,
  type ZoneStateComponent,
  createStatusEffects,
} from '../components';
import { PlayerFactory, type PrimaryAttributes } from '../data/PlayerFactory';
import { EnemyFactory } from '../data/EnemyFactory';
import {
  type PlayerActionDefinition,
  type PlayerStats,
  findPlayerAction,
  getPlayerActions,
} from '../data/PlayerActions';
import { type ZoneDefinition, type ZoneMap, createZoneStates, loadDefaultZones } from '../data/ZoneLoader';
import {
  BARRIER_BROKEN,
  BOSS_DEFEATED,
  FINAL_BOSS_DEFEATED,
  FINAL_BOSS_INTRO,
  PLAYER_DEFEATED,
  RETURNED_TO_HUB,
  keyCollectedMessage,
  zoneEnteredMessage,
} from '../data/StoryMessages';
import {
  type BattlePhase,
  type BattleReport,
  BattleSystem,
  type TurnResult,
} from '../systems/BattleSystem';
import { ProgressionSystem } from '../systems/ProgressionSystem';
import { ZoneProgressSystem } from '../systems/ZoneProgressSystem';
import { type Direction, ExplorationSystem, type MoveOutcome, type TileRef } from '../systems/ExplorationSystem';
import { HUB_START, HUB_ZONE_ID, KEYS_REQUIRED } from '../../config';
import { createContextLogger } from '../../utils/logger';

const logger = createContextLogger('GameEngine');

export type GameMode = 'exploring' | 'battle' | 'defeated' | 'victory';

export interface GameEngineOptions {
  seed: number;
  zones?: ZoneMap;
  /** Overrides the seeded roller, e.g. with a scripted one */
  roller?: DiceRoller;
  /** Caps the event history; unbounded by default */
  maxEventHistory?: number;
}

export interface NewGameOptions {
  name: string;
  attributes?: PrimaryAttributes;
}

export interface BattleState {
  enemyId: EntityId;
  archetype: EnemyArchetypeId;
  /** Tile that started the fight; null for random encounters and Marduk */
  source: TileRef | null;
  phase: BattlePhase;
}

export type SubmitResult =
  | { accepted: false; reasons: string[] }
  | { accepted: true; result: TurnResult; report: BattleReport | null };

export interface EffectsView {
  poisonTurns: number;
  protectionTurns: number;
  healingTurns: number;
}

export interface CombatantView {
  id: EntityId;
  name: string;
  currentHealth: number;
  maxHealth: number;
  numHealingPotions: number;
  effects: EffectsView;
}

export interface AvailableAction {
  action: PlayerActionDefinition;
  available: boolean;
  reasons: string[];
}

export interface BattleView {
  archetype: EnemyArchetypeId;
  phase: BattlePhase;
  player: CombatantView & { currentMana: number; maxMana: number };
  enemy: CombatantView;
  actions: AvailableAction[];
}

export interface PlayerView {
  id: EntityId;
  name: string;
  level: number;
  experience: number;
  experienceToNextLevel: number;
  unspentAttributePoints: number;
  attributes: PrimaryAttributes;
  currentHealth: number;
  maxHealth: number;
  currentMana: number;
  maxMana: number;
  manaRegen: number;
  criticalChance: number;
  dodgeChance: number;
  specialDamage: number;
  zoneId: string;
  zoneName: string;
  x: number;
  y: number;
  facing: 'left' | 'right';
  keysCollected: number;
}

export interface ZoneView {
  zone: ZoneDefinition;
  state: ZoneStateComponent;
  playerX: number;
  playerY: number;
}

export interface ReplayTurn {
  turn: number;
  events: GameEvent[];
}

export interface GameSnapshot {
  turn: number;
  mode: GameMode;
  timestamp: number;
  playerId: EntityId | null;
  battle: BattleState | null;
  entities: Record<EntityId, Record<string, Component>>;
  nextEntityId: number;
  randomState: DiceState;
  messages: string[];
  turnLog: GameEvent[];
  replayTurns: ReplayTurn[];
}

export class GameEngine {
  private world: WorldImpl;
  private diceRoller: DiceRoller;
  private eventBus: EventBusImpl;
  private zones: ZoneMap;
  private turn: number = 0;
  private mode: GameMode = 'exploring';
  private playerId: EntityId | null = null;
  private battle: BattleState | null = null;
  private messages: string[] = [];

  constructor(options: GameEngineOptions) {
    this.world = new WorldImpl();
    this.diceRoller = options.roller ?? new DiceRoller(options.seed);
    this.eventBus = new EventBusImpl(options.maxEventHistory);
    this.zones = options.zones ?? loadDefaultZones();
  }

  // Game lifecycle
  newGame(options: NewGameOptions): EntityId {
    PlayerFactory.validateOptions({ name: options.name, attributes: options.attributes });

    this.world.clear();
    this.eventBus.clearHistory();
    this.turn = 0;
    this.mode = 'exploring';
    this.battle = null;
    this.messages = [];

    createZoneStates(this.world, this.zones);
    this.playerId = PlayerFactory.createPlayer(this.world, {
      name: options.name,
      attributes: options.attributes,
      zoneId: HUB_ZONE_ID,
      x: HUB_START.x,
      y: HUB_START.y,
    });

    this.emitEvent({
      type: 'GameStarted',
      turn: 0,
      timestamp: Date.now(),
      entityId: this.playerId,
      data: { name: options.name.trim() },
    });
    logger.info(`New game for ${options.name.trim()}`);
    return this.playerId;
  }

  getMode(): GameMode {
    return this.mode;
  }

  getTurn(): number {
    return this.turn;
  }

  getPlayerId(): EntityId {
    return this.requirePlayer();
  }

  getBattle(): BattleState | null {
    return this.battle ? { ...this.battle } : null;
  }

  // Exploration
  move(direction: Direction): MoveOutcome {
    const playerId = this.requirePlayer();
    this.requireMode('exploring');
    this.turn++;

    const outcome = ExplorationSystem.movePlayer(
      this.world,
      this.eventBus,
      this.diceRoller,
      this.zones,
      playerId,
      direction,
      this.turn
    );

    switch (outcome.kind) {
      case 'zoneChanged': {
        const zone = ExplorationSystem.getZone(this.zones, outcome.to);
        this.messages.push(zoneEnteredMessage(zone.name));
        logger.info(`Entered zone ${outcome.to}`);
        break;
      }
      case 'keyCollected':
        this.messages.push(keyCollectedMessage(outcome.keysCollected, KEYS_REQUIRED));
        logger.info(`Key collected (${outcome.keysCollected}/${KEYS_REQUIRED})`);
        break;
      case 'battle':
        this.startBattle(outcome.archetype, outcome.source);
        break;
      case 'randomEncounter':
        this.startBattle('randomEncounter', null);
        break;
      default:
        break;
    }
    return outcome;
  }

  startBattle(archetype: EnemyArchetypeId, source: TileRef | null = null): EntityId {
    const playerId = this.requirePlayer();
    this.requireMode('exploring');

    const experience = this.world.requireComponent<ExperienceComponent>(playerId, 'experience');
    const enemyId = EnemyFactory.createEnemy(this.world, archetype, experience.total, this.diceRoller);
    this.beginBattle({ enemyId, archetype, source, phase: 'awaitingPlayerInput' });
    return enemyId;
  }

  /**
   * Resolves one turn with the named action. Unknown or currently unusable
   * actions are rejected without touching any state.
   */
  submitPlayerAction(actionName: string): SubmitResult {
    const playerId = this.requirePlayer();
    const battle = this.requireBattlePhase('awaitingPlayerInput');

    const action = findPlayerAction(actionName, this.getPlayerStats(playerId));
    const reasons = action
      ? BattleSystem.validatePlayerAction(this.world, playerId, battle.enemyId, action)
      : [`unknown action "${actionName}"`];

    if (!action || reasons.length > 0) {
      this.emitEvent({
        type: 'PlayerActionRejected',
        turn: this.turn,
        timestamp: Date.now(),
        entityId: playerId,
        data: { action: actionName, reasons },
      });
      logger.debug(`Rejected ${actionName}: ${reasons.join(', ')}`);
      return { accepted: false, reasons };
    }

    this.turn++;
    battle.phase = 'resolvingTurn';
    this.emitEvent({
      type: 'TurnStarted',
      turn: this.turn,
      timestamp: Date.now(),
      entityId: playerId,
      targetId: battle.enemyId,
      data: {},
    });

    const result = BattleSystem.resolveTurn(
      this.world,
      this.eventBus,
      this.diceRoller,
      { playerId, enemyId: battle.enemyId, turn: this.turn },
      action
    );
    logger.debug(
      `Turn ${this.turn}: ${result.playerOutcome.action.name} (${result.playerOutcome.damage} dmg, ` +
        `${result.playerOutcome.healed} healed)` +
        (result.enemyOutcome
          ? `, ${result.enemyOutcome.action.name} (${result.enemyOutcome.damage} dmg, ${result.enemyOutcome.healed} healed)`
          : '') +
        ` -> ${result.status}`
    );

    if (result.report) {
      this.applyBattleReport(playerId, battle, result.report);
    } else {
      battle.phase = 'awaitingPlayerInput';
    }
    return { accepted: true, result, report: result.report };
  }

  retryBattle(): void {
    this.requireMode('defeated');
    const battle = this.requireBattle();
    EnemyFactory.resetEnemy(this.world, battle.enemyId);
    this.beginBattle({ ...battle, phase: 'awaitingPlayerInput' });
  }

  canReturnToHub(): boolean {
    return (
      this.mode === 'defeated' &&
      this.battle !== null &&
      this.battle.archetype !== 'randomEncounter' &&
      this.battle.archetype !== 'finalBoss'
    );
  }

  returnToHub(): void {
    const playerId = this.requirePlayer();
    this.requireMode('defeated');
    const battle = this.requireBattle();
    if (!this.canReturnToHub()) {
      throw new Error(`Cannot return to the hub after losing to ${battle.archetype}`);
    }

    this.world.removeEntity(battle.enemyId);
    this.battle = null;

    const health = this.world.requireComponent<HealthComponent>(playerId, 'health');
    this.world.addComponent<HealthComponent>(playerId, { ...health, current: 1 });
    this.world.addComponent(playerId, createStatusEffects());

    const position = this.world.requireComponent<PositionComponent>(playerId, 'position');
    this.world.addComponent<PositionComponent>(playerId, {
      ...position,
      zoneId: HUB_ZONE_ID,
      x: HUB_START.x,
      y: HUB_START.y,
    });

    this.mode = 'exploring';
    this.messages.push(RETURNED_TO_HUB);
    this.emitEvent({
      type: 'PlayerReturnedToHub',
      turn: this.turn,
      timestamp: Date.now(),
      entityId: playerId,
      data: { zoneId: HUB_ZONE_ID, x: HUB_START.x, y: HUB_START.y },
    });
    logger.info('Player returned to the hub');
  }

  /**
   * World tick. Summons Marduk once every key is in hand. Returns true when
   * that happened on this call.
   */
  update(): boolean {
    if (this.playerId === null || this.mode !== 'exploring') return false;

    const progress = this.world.requireComponent<ProgressComponent>(this.playerId, 'progress');
    if (progress.keysCollected < KEYS_REQUIRED || progress.finalBossDefeated) return false;

    this.messages.push(...FINAL_BOSS_INTRO);
    this.emitEvent({
      type: 'FinalBossSummoned',
      turn: this.turn,
      timestamp: Date.now(),
      entityId: this.playerId,
      data: { keysCollected: progress.keysCollected },
    });
    this.startBattle('finalBoss', null);
    return true;
  }

  drainMessages(): string[] {
    const drained = this.messages;
    this.messages = [];
    return drained;
  }

  // Progression
  spendAttributePoint(attribute: PrimaryAttribute): boolean {
    const playerId = this.requirePlayer();
    if (this.mode === 'battle') {
      throw new Error('Cannot spend attribute points during a battle');
    }
    return ProgressionSystem.spendAttributePoint(this.world, this.eventBus, playerId, attribute, this.turn);
  }

  // Views
  getAvailableActions(): AvailableAction[] {
    const playerId = this.requirePlayer();
    const battle = this.requireBattle();
    return getPlayerActions(this.getPlayerStats(playerId)).map((action) => {
      const reasons = BattleSystem.validatePlayerAction(this.world, playerId, battle.enemyId, action);
      return { action, available: reasons.length === 0, reasons };
    });
  }

  getBattleView(): BattleView | null {
    if (this.playerId === null || this.battle === null) return null;
    const mana = this.world.requireComponent<ManaComponent>(this.playerId, 'mana');
    return {
      archetype: this.battle.archetype,
      phase: this.battle.phase,
      player: {
        ...this.getCombatantView(this.playerId),
        currentMana: mana.current,
        maxMana: mana.max,
      },
      enemy: this.getCombatantView(this.battle.enemyId),
      actions: this.getAvailableActions(),
    };
  }

  getPlayerView(): PlayerView {
    const playerId = this.requirePlayer();
    const attrs = this.world.requireComponent<AttributesComponent>(playerId, 'attributes');
    const attributes: PrimaryAttributes = {
      intelligence: attrs.intelligence,
      health: attrs.health,
      special: attrs.special,
      abilities: attrs.abilities,
    };
    const experience = this.world.requireComponent<ExperienceComponent>(playerId, 'experience').total;
    const health = this.world.requireComponent<HealthComponent>(playerId, 'health');
    const mana = this.world.requireComponent<ManaComponent>(playerId, 'mana');
    const stats = this.world.requireComponent<CombatStatsComponent>(playerId, 'combatStats');
    const position = this.world.requireComponent<PositionComponent>(playerId, 'position');
    const progress = this.world.requireComponent<ProgressComponent>(playerId, 'progress');

    return {
      id: playerId,
      name: this.world.getComponent<IdentityComponent>(playerId, 'identity')?.name ?? '',
      level: ProgressionSystem.getLevel(experience),
      experience,
      experienceToNextLevel: ProgressionSystem.experienceToNextLevel(experience),
      unspentAttributePoints: ProgressionSystem.getUnspentAttributePoints(attributes, experience),
      attributes,
      currentHealth: health.current,
      maxHealth: health.max,
      currentMana: mana.current,
      maxMana: mana.max,
      manaRegen: mana.regenPerTurn,
      criticalChance: stats.criticalChance,
      dodgeChance: stats.dodgeChance,
      specialDamage: stats.baseAttackDamage,
      zoneId: position.zoneId,
      zoneName: ExplorationSystem.getZone(this.zones, position.zoneId).name,
      x: position.x,
      y: position.y,
      facing: position.facing,
      keysCollected: progress.keysCollected,
    };
  }

  getZoneView(): ZoneView {
    const playerId = this.requirePlayer();
    const position = this.world.requireComponent<PositionComponent>(playerId, 'position');
    return {
      zone: ExplorationSystem.getZone(this.zones, position.zoneId),
      state: ZoneProgressSystem.getZoneState(this.world, position.zoneId),
      playerX: position.x,
      playerY: position.y,
    };
  }

  getStepsSinceEncounter(): number {
    const playerId = this.requirePlayer();
    return this.world.requireComponent<EncounterComponent>(playerId, 'encounter').stepsSinceEncounter;
  }

  // Events
  emitEvent(event: GameEvent): void {
    this.eventBus.emit(event);
  }

  getEventHistory(): GameEvent[] {
    return this.eventBus.getHistory();
  }

  // Events of one turn, the current one by default
  getTurnEvents(turn: number = this.turn): GameEvent[] {
    return this.eventBus.getHistoryForTurn(turn);
  }

  subscribeToEvent(type: GameEventType, callback: GameEventListener): () => void {
    return this.eventBus.subscribe(type, callback);
  }

  subscribeToAllEvents(callback: GameEventListener): () => void {
    return this.eventBus.subscribeAll(callback);
  }

  getEventBus(): EventBusImpl {
    return this.eventBus;
  }

  getWorld(): WorldImpl {
    return this.world;
  }

  getDiceRoller(): DiceRoller {
    return this.diceRoller;
  }

  getZones(): ZoneMap {
    return this.zones;
  }

  // Snapshots
  createSnapshot(): GameSnapshot {
    const entities: Record<EntityId, Record<string, Component>> = {};
    for (const entityId of this.world.getAllEntities()) {
      entities[entityId] = this.world.getEntityComponents(entityId);
    }

    const turnLog = this.eventBus.getHistory();
    const byTurn = new Map<number, GameEvent[]>();
    for (const e of turnLog) {
      const list = byTurn.get(e.turn) ?? [];
      list.push(e);
      byTurn.set(e.turn, list);
    }
    const replayTurns: ReplayTurn[] = [...byTurn].map(([turn, events]) => ({ turn, events }));
    replayTurns.sort((a, b) => a.turn - b.turn);

    return {
      turn: this.turn,
      mode: this.mode,
      timestamp: Date.now(),
      playerId: this.playerId,
      battle: this.battle ? { ...this.battle } : null,
      entities,
      nextEntityId: this.world.getNextEntityId(),
      randomState: this.diceRoller.getState(),
      messages: [...this.messages],
      turnLog,
      replayTurns,
    };
  }

  loadSnapshot(snapshot: GameSnapshot): void {
    this.world.clear();
    this.eventBus.clearHistory();

    for (const [entityId, components] of Object.entries(snapshot.entities)) {
      this.world.loadEntity(entityId, components);
    }
    this.world.setNextEntityId(snapshot.nextEntityId);

    this.turn = snapshot.turn;
    this.mode = snapshot.mode;
    this.playerId = snapshot.playerId;
    this.battle = snapshot.battle ? { ...snapshot.battle } : null;
    this.messages = [...snapshot.messages];
    this.diceRoller.setState(snapshot.randomState);

    for (const event of snapshot.turnLog) {
      this.eventBus.emit(event);
    }
  }

  // Internals
  private beginBattle(battle: BattleState): void {
    const playerId = this.requirePlayer();
    BattleSystem.startBattle(this.world, this.eventBus, playerId, battle.enemyId, this.turn);
    this.battle = battle;
    this.mode = 'battle';

    const health = this.world.requireComponent<HealthComponent>(battle.enemyId, 'health');
    logger.info(`Battle started against ${battle.archetype} (${health.max} health)`);
  }

  private applyBattleReport(playerId: EntityId, battle: BattleState, report: BattleReport): void {
    battle.phase = report.outcome;
    logger.info(`Battle against ${battle.archetype} ended: ${report.outcome}`);

    if (report.outcome === 'playerDefeated') {
      this.mode = 'defeated';
      this.messages.push(PLAYER_DEFEATED);
      this.emitEvent({
        type: 'PlayerDied',
        turn: this.turn,
        timestamp: Date.now(),
        entityId: playerId,
        targetId: battle.enemyId,
        data: { archetype: battle.archetype },
      });
      return;
    }

    ProgressionSystem.addExperience(this.world, this.eventBus, playerId, report.experienceGained, this.turn);

    if (battle.source) {
      const { zoneId, x, y } = battle.source;
      ZoneProgressSystem.clearTile(this.world, this.eventBus, zoneId, x, y, this.turn);
    }

    switch (battle.archetype) {
      case 'mainEnemy': {
        const position = this.world.requireComponent<PositionComponent>(playerId, 'position');
        const zone = ExplorationSystem.getZone(this.zones, battle.source?.zoneId ?? position.zoneId);
        if (ZoneProgressSystem.recordMainEnemyDefeat(this.world, this.eventBus, zone, this.turn)) {
          this.messages.push(BARRIER_BROKEN);
        }
        break;
      }
      case 'boss':
        this.messages.push(BOSS_DEFEATED);
        break;
      case 'finalBoss': {
        const progress = this.world.requireComponent<ProgressComponent>(playerId, 'progress');
        this.world.addComponent<ProgressComponent>(playerId, { ...progress, finalBossDefeated: true });
        this.messages.push(...FINAL_BOSS_DEFEATED);
        break;
      }
      case 'randomEncounter':
        break;
    }

    this.world.removeEntity(battle.enemyId);
    this.battle = null;

    if (battle.archetype === 'finalBoss') {
      this.mode = 'victory';
      this.emitEvent({
        type: 'GameWon',
        turn: this.turn,
        timestamp: Date.now(),
        entityId: playerId,
        data: {},
      });
      logger.info('Marduk defeated');
    } else {
      this.mode = 'exploring';
    }
  }

  private getPlayerStats(playerId: EntityId): PlayerStats {
    const stats = this.world.requireComponent<CombatStatsComponent>(playerId, 'combatStats');
    const potions = this.world.requireComponent<PotionsComponent>(playerId, 'potions');
    return { baseAttackDamage: stats.baseAttackDamage, healingPotionHealth: potions.healingPotionHealth };
  }

  private getCombatantView(entityId: EntityId): CombatantView {
    const health = this.world.requireComponent<HealthComponent>(entityId, 'health');
    const effects =
      this.world.getComponent<StatusEffectsComponent>(entityId, 'statusEffects') ?? createStatusEffects();
    return {
      id: entityId,
      name: this.world.getComponent<IdentityComponent>(entityId, 'identity')?.name ?? entityId,
      currentHealth: health.current,
      maxHealth: health.max,
      numHealingPotions: this.world.getComponent<PotionsComponent>(entityId, 'potions')?.numHealingPotions ?? 0,
      effects: {
        poisonTurns: effects.poison.turnsRemaining,
        protectionTurns: effects.protection.turnsRemaining,
        healingTurns: effects.healing.turnsRemaining,
      },
    };
  }

  private requirePlayer(): EntityId {
    if (this.playerId === null) {
      throw new Error('No game in progress');
    }
    return this.playerId;
  }

  private requireMode(mode: GameMode): void {
    if (this.mode !== mode) {
      throw new Error(`Not in ${mode} mode (current: ${this.mode})`);
    }
  }

  private requireBattle(): BattleState {
    if (this.battle === null) {
      throw new Error('No battle in progress');
    }
    return this.battle;
  }

  private requireBattlePhase(phase: BattlePhase): BattleState {
    this.requireMode('battle');
    const battle = this.requireBattle();
    if (battle.phase !== phase) {
      throw new Error(`Not in ${phase} phase (current: ${battle.phase})`);
    }
    return battle;
  }
}
