import type { BattleView, CombatantView, PlayerView, ZoneView } from '../engine/core/GameEngine';
import type { TileDefinition } from '../engine/data/ZoneLoader';
import { tileKey } from '../engine/components';
import { describeAction } from '../engine/actions/Action';
import { GRID_SIZE } from '../config';

export const MAP_LEGEND = '@ you   # wall   O exit   E follower   B lieutenant   = barrier   K key';

function tileSymbol(tile: TileDefinition): string {
  switch (tile.kind) {
    case 'loadingZone':
      return 'O';
    case 'battle':
      return tile.archetype === 'boss' ? 'B' : 'E';
    case 'barrier':
      return '=';
    case 'key':
      return 'K';
  }
}

// One string per row, top row first
export function renderZone(view: ZoneView): string[] {
  const { zone, state } = view;
  const rows: string[] = [];
  for (let y = 0; y < GRID_SIZE; y++) {
    let row = '';
    for (let x = 0; x < GRID_SIZE; x++) {
      const key = tileKey(x, y);
      const tile = zone.tiles.get(key);
      if (x === view.playerX && y === view.playerY) {
        row += '@';
      } else if (zone.walls.has(key)) {
        row += '#';
      } else if (tile && !state.clearedTiles.includes(key)) {
        row += tileSymbol(tile);
      } else {
        row += '.';
      }
    }
    rows.push(row.split('').join(' '));
  }
  return rows;
}

function formatEffects(view: CombatantView): string {
  const parts: string[] = [];
  if (view.effects.poisonTurns > 0) parts.push(`poisoned ${view.effects.poisonTurns}`);
  if (view.effects.protectionTurns > 0) parts.push(`protected ${view.effects.protectionTurns}`);
  if (view.effects.healingTurns > 0) parts.push(`healing ${view.effects.healingTurns}`);
  return parts.length > 0 ? ` [${parts.join(', ')}]` : '';
}

export function formatBattleView(view: BattleView): string[] {
  const { player, enemy } = view;
  return [
    `${player.name}: HP ${player.currentHealth}/${player.maxHealth}  MP ${player.currentMana}/${player.maxMana}  ` +
      `potions ${player.numHealingPotions}${formatEffects(player)}`,
    `${enemy.name}: HP ${enemy.currentHealth}/${enemy.maxHealth}  potions ${enemy.numHealingPotions}${formatEffects(enemy)}`,
  ];
}

export function formatActions(view: BattleView): string[] {
  return view.actions.map(({ action, available, reasons }, i) => {
    const cost = action.manaCost > 0 ? ` (${action.manaCost} MP)` : '';
    const line = `${String(i + 1).padStart(2)}. ${describeAction(action)}${cost}`;
    return available ? line : `${line}  -- ${reasons.join('; ')}`;
  });
}

export function formatPlayerView(view: PlayerView): string[] {
  const pct = (chance: number): string => `${Math.round(chance * 1000) / 10}%`;
  return [
    `${view.name}, level ${view.level} (${view.experience} exp, ${view.experienceToNextLevel} to next level)`,
    `HP ${view.currentHealth}/${view.maxHealth}  MP ${view.currentMana}/${view.maxMana} (+${view.manaRegen}/turn)`,
    `Intelligence ${view.attributes.intelligence}  Health ${view.attributes.health}  ` +
      `Special ${view.attributes.special}  Abilities ${view.attributes.abilities}  ` +
      `(${view.unspentAttributePoints} unspent)`,
    `Critical ${pct(view.criticalChance)}  Dodge ${pct(view.dodgeChance)}  Special damage ${view.specialDamage}`,
    `${view.zoneName} (${view.x}, ${view.y})  keys ${view.keysCollected}`,
  ];
}
