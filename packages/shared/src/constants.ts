export const UPKEEP_PER_TICK = 1; // Sparks burned by every living mind each tick
export const STARTING_SPARKS = 5; // Balance of a genesis mind
export const SPAWN_COST = 5; // Paid by the parent
export const CHILD_STARTING_SPARKS = 5; // Balance given to a spawned mind
export const MAX_GRANT_PER_REQUEST = 5;
export const RAID_STAKE = 1; // Lost to the defender on a failed raid
export const RAID_MIN_STEAL = 1;
export const RAID_MAX_STEAL = 5;
export const MIN_BOND_SIZE = 2;

export const AGENT_ID_PREFIX = "agent_";
export const BOND_ID_PREFIX = "bond_";
export const MISSION_ID_PREFIX = "mission_";

export function formatEntityId(prefix: string, seq: number): string {
  return `${prefix}${String(seq).padStart(3, "0")}`;
}

// Benefactor reserves scale with the founding population
export function initialBenefactorBalance(numAgents: number): number {
  return numAgents;
}

export function benefactorRegenPerTick(numAgents: number): number {
  return Math.max(1, Math.floor(Math.sqrt(numAgents)));
}
