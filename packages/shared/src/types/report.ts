import type { DroppedAction, PendingAction } from "./action.js";
import type { GrantOutcome, GrantRefusal, LedgerEntry, RaidResult } from "./ledger.js";

export type TickStage =
  | "upkeep_and_mint"
  | "benefactor_grants"
  | "agent_decisions"
  | "spark_distribution"
  | "action_resolution"
  | "report";

export type BondDissolutionReason = "member_vanished" | "mission_complete";

export interface BondFormation {
  bondId: string;
  members: string[];
  leaderId: string;
  missionId: string;
}

export interface BondDissolution {
  bondId: string;
  members: string[];
  missionId: string | null;
  reason: BondDissolutionReason;
  vanishedAgentId: string | null;
}

export interface SpawnRecord {
  parentId: string;
  childId: string;
  childName: string;
}

export interface MissionCompletion {
  missionId: string;
  bondId: string;
  reason: "goal_met" | "bond_dissolved";
}

export interface OracleFailure {
  oracle: "decision" | "benefactor" | "character" | "mission" | "coordinator" | "evaluator";
  subjectId: string | null;
  message: string;
}

/** Everything that happened in one tick; the only channel to narration and UI. */
export interface TickReport {
  simulationId: string;
  tick: number;
  stages: Record<TickStage, string>;
  decisions: PendingAction[];
  droppedActions: DroppedAction[];
  ledger: LedgerEntry[];
  raids: RaidResult[];
  grants: GrantOutcome[];
  grantRefusals: GrantRefusal[];
  bondsFormed: BondFormation[];
  bondsDissolved: BondDissolution[];
  agentsVanished: string[];
  agentsSpawned: SpawnRecord[];
  missionsCreated: string[];
  missionsCompleted: MissionCompletion[];
  oracleFailures: OracleFailure[];
  sparksMinted: number;
  sparksLost: number;
  benefactorBalance: number;
  aliveAgents: number;
}
