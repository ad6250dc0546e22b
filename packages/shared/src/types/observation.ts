import type { Agent, PublicAgentInfo } from "./agent.js";
import type { ActionIntent, PendingAction } from "./action.js";
import type { GrantOutcome } from "./ledger.js";
import type { AgentEvent, WorldNews } from "./world.js";

export interface MissionStatus {
  missionId: string;
  title: string;
  description: string;
  goal: string;
  currentProgress: string;
  leaderId: string;
  assignedTasks: Record<string, string>;
  teamMembers: string[];
}

export interface GameRules {
  upkeepPerTick: number;
  bondMintFormula: string;
  raidStrengthFormula: string;
  spawnCost: number;
  maxGrantPerRequest: number;
}

/** The read-only snapshot a decision oracle may see for one agent. */
export interface Observation {
  tick: number;
  self: Agent;
  /** Bond requests and messages sent to this agent during the previous tick. */
  inbox: PendingAction[];
  /** Benefactor answers computed this tick for requests made last tick. */
  grantOutcomes: GrantOutcome[];
  eventsSinceLast: AgentEvent[];
  news: WorldNews;
  publicAgents: PublicAgentInfo[];
  mission: MissionStatus | null;
  availableActions: ActionIntent[];
  rules: GameRules;
}
