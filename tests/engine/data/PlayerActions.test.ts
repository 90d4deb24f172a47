import { describe, it, expect } from 'vitest';
import { findPlayerAction, getPlayerActions } from '../../../src/engine/data/PlayerActions';
import { createAction, describeAction } from '../../../src/engine/actions/Action';

const stats = { baseAttackDamage: 900, healingPotionHealth: 500 };

describe('PlayerActions', () => {
  it('lists the catalog in menu order', () => {
    expect(getPlayerActions(stats).map((a) => a.name)).toEqual([
      'Weak Hit',
      'Medium Hit',
      'Strong Hit',
      'Weak Poison',
      'Medium Poison',
      'Strong Poison',
      'Weak Healing',
      'Strong Healing',
      'Sustained Healing',
      'Weak Protection',
      'Strong Protection',
      'Special Attack',
      'Healing Potion',
    ]);
  });

  it('fills stat-based magnitudes from the player', () => {
    expect(findPlayerAction('Special Attack', stats)).toEqual({
      name: 'Special Attack',
      type: 'SPECIAL',
      magnitude: 900,
      duration: 0,
      manaCost: 1000,
      requiredAbilityPoints: 0,
      usesPotion: false,
    });
    const potion = findPlayerAction('Healing Potion', stats);
    expect(potion?.magnitude).toBe(500);
    expect(potion?.usesPotion).toBe(true);
  });

  it('finds actions by name regardless of case and padding', () => {
    expect(findPlayerAction('  medium POISON ', stats)).toMatchObject({
      type: 'POISON',
      magnitude: 150,
      duration: 4,
      manaCost: 300,
      requiredAbilityPoints: 3,
    });
    expect(findPlayerAction('Fireball', stats)).toBeUndefined();
  });

  it('returns frozen actions', () => {
    const action = findPlayerAction('Weak Hit', stats);
    expect(Object.isFrozen(action)).toBe(true);
  });
});

describe('Action', () => {
  it('floors and clamps numbers', () => {
    expect(createAction('Odd', 'HIT', 10.7, -3)).toEqual({ name: 'Odd', type: 'HIT', magnitude: 10, duration: 0 });
  });

  it('describes each kind of action', () => {
    expect(describeAction(createAction('Weak Hit', 'HIT', 300))).toBe('Weak Hit (300 damage)');
    expect(describeAction(createAction('Weak Poison', 'POISON', 100, 3))).toBe(
      'Weak Poison (100 poison for 3 turns)'
    );
    expect(describeAction(createAction('Weak Healing', 'HEALING', 250))).toBe('Weak Healing (+250 health)');
    expect(describeAction(createAction('Sustained Healing', 'HEALING', 500, 4))).toBe(
      'Sustained Healing (+500 now and for 4 turns)'
    );
    expect(describeAction(createAction('Weak Protection', 'PROTECTION', 50, 3))).toBe(
      'Weak Protection (50% less damage for 3 turns)'
    );
  });
});
