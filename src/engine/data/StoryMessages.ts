export const FINAL_BOSS_INTRO: readonly string[] = [
  'The last key settles into your pack and the ground shudders. A voice rolls across the sky: "I AM MARDUK! Do you truly think a mage like you can stand against me?"',
  '"Come then, and meet your end..."',
  'A dark shape sinks slowly out of the clouds, and the air grows heavy with its magic.',
  'Marduk lands before you and strikes. The fight for your life begins.',
];

export const FINAL_BOSS_DEFEATED: readonly string[] = [
  'Your final blow lands and Marduk screams: "No... this cannot be..."',
  'The gloom lifts from the land. Marduk is gone, and the people can live in peace again.',
];

export const BOSS_DEFEATED =
  "Marduk's lieutenant crumbles to ash. Far off, thunder rumbles, as if Marduk himself is displeased.";

export const BARRIER_BROKEN =
  "The last of Marduk's followers here falls. Something shatters like glass and the barrier is gone, revealing one of his lieutenants.";

export function keyCollectedMessage(keysCollected: number, keysRequired: number): string {
  const left = keysRequired - keysCollected;
  return left > 0
    ? `You pick up a key (${keysCollected}/${keysRequired}). ${left} more to find.`
    : `You pick up a key (${keysCollected}/${keysRequired}).`;
}

export function zoneEnteredMessage(zoneName: string): string {
  return `You enter ${zoneName}.`;
}

export const PLAYER_DEFEATED = 'You have been defeated.';

export const RETURNED_TO_HUB = 'You wake up back in the hub, barely alive.';
