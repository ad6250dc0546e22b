import type { Agent } from "./agent.js";
import type { Bond, Mission } from "./bond.js";
import type { PendingAction } from "./action.js";
import type { BenefactorLedger } from "./ledger.js";

export type AgentEventType =
  | "raid_attack"
  | "raid_defense"
  | "bond_formed"
  | "bond_dissolved"
  | "child_spawned"
  | "grant_received"
  | "action_dropped";

/** Something that happened to one agent, shown to it one tick later. */
export interface AgentEvent {
  tick: number;
  agentId: string;
  type: AgentEventType;
  description: string;
  sparkChange: number;
  sourceAgentId: string | null;
}

export interface WorldNews {
  tick: number;
  agentsVanished: string[];
  agentsSpawned: string[];
  bondsFormed: string[];
  bondsDissolved: string[];
}

/** One generation of the double-buffered visibility tables. */
export interface VisibilityBuffer {
  /** The tick that produced this generation. */
  tick: number;
  /** Bond requests and messages, addressed by targetId. */
  mail: PendingAction[];
  grantRequests: PendingAction[];
  /** Every decision taken during the tick, replayed to mission meetings. */
  actions: PendingAction[];
  events: AgentEvent[];
  news: WorldNews;
}

export interface WorldCounters {
  nextAgentSeq: number;
  nextBondSeq: number;
  nextMissionSeq: number;
}

export interface WorldTotals {
  totalSparksMinted: number;
  totalSparksLost: number;
  totalRaidsAttempted: number;
  totalBondsFormed: number;
}

export interface WorldState {
  simulationId: string;
  name: string;
  tick: number;
  agents: Record<string, Agent>;
  bonds: Record<string, Bond>;
  missions: Record<string, Mission>;
  benefactor: BenefactorLedger;
  visibility: {
    current: VisibilityBuffer;
    frozen: VisibilityBuffer;
  };
  counters: WorldCounters;
  totals: WorldTotals;
}
