export type LedgerReason =
  | "upkeep"
  | "bond_mint"
  | "benefactor_grant"
  | "benefactor_regen"
  | "raid_success"
  | "raid_failure"
  | "spawn_cost"
  | "birth_grant";

/**
 * One spark movement. Sources and sinks that are not agents use the
 * pseudo-entities "upkeep", "benefactor", "regen" and bond ids.
 */
export interface LedgerEntry {
  tick: number;
  from: string;
  to: string;
  amount: number;
  reason: LedgerReason;
  note: string;
}

export type RaidOutcome = "won" | "lost" | "insufficient_stake";

export interface RaidResult {
  tick: number;
  attackerId: string;
  defenderId: string;
  outcome: RaidOutcome;
  attackerStrength: number;
  defenderStrength: number;
  successProbability: number;
  /** Positive: attacker gained. Negative: attacker lost. */
  sparksTransferred: number;
}

export interface GrantRequest {
  agentId: string;
  content: string;
  reasoning: string;
  tick: number;
}

export interface GrantDecision {
  agentId: string;
  amountGranted: number;
  reasoning: string;
}

export interface GrantOutcome {
  tick: number;
  agentId: string;
  requestContent: string;
  amountGranted: number;
  balanceBefore: number;
  balanceAfter: number;
  reasoning: string;
}

/** A benefactor answer for a mind with no open request this tick. */
export interface GrantRefusal {
  tick: number;
  agentId: string;
  amountOffered: number;
  reasoning: string;
}

export interface BenefactorLedger {
  balance: number;
  regenPerTick: number;
}
