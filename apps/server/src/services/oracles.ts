import {
  TARGETED_INTENTS,
  isActionIntent,
  type Agent,
  type AgentDecision,
  type GrantDecision,
  type GrantRequest,
  type Mission,
  type MissionContent,
  type Observation,
  type PendingAction,
  type Persona,
} from "@spark-world/shared";
import type { MeetingOutcome, MissionEvaluation } from "./mission-lifecycle.js";

// Narrow contracts for everything that produces language. The engine never
// looks past these shapes; implementations live in claude-client.ts and
// heuristic-oracles.ts.

export interface DecisionOracle {
  decide(agentId: string, observation: Observation, signal: AbortSignal): Promise<AgentDecision>;
}

export interface GrantContext {
  balance: number;
  tick: number;
  requests: GrantRequest[];
}

export interface BenefactorOracle {
  decideGrants(context: GrantContext, signal: AbortSignal): Promise<GrantDecision[]>;
}

export interface SpawnContext {
  tick: number;
  existingNames: string[];
  parent: Agent | null;
}

export interface CharacterGenerator {
  spawn(context: SpawnContext, signal: AbortSignal): Promise<Persona>;
}

export interface MissionContext {
  tick: number;
  totalAgents: number;
  activeBonds: number;
}

export interface MissionOracle {
  generateMission(members: Agent[], context: MissionContext, signal: AbortSignal): Promise<MissionContent>;
  evaluateProgress(mission: Mission, actions: PendingAction[], signal: AbortSignal): Promise<MissionEvaluation>;
  coordinateMeeting(
    mission: Mission,
    members: Agent[],
    previousActions: PendingAction[],
    signal: AbortSignal
  ): Promise<MeetingOutcome>;
}

export interface Oracles {
  decisions: DecisionOracle;
  benefactor: BenefactorOracle;
  characters: CharacterGenerator;
  missions: MissionOracle;
}

export const IDLE_DECISION: AgentDecision = {
  intent: "idle",
  targetId: null,
  content: "",
  reasoning: "No decision this tick",
};

// Targets arrive as free text; "None", "null" and blanks mean no target
const EMPTY_TARGETS = new Set(["", "none", "null", "undefined", "n/a"]);

function normalizeTarget(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return EMPTY_TARGETS.has(trimmed.toLowerCase()) ? null : trimmed;
}

/** Coerce whatever an oracle produced into a decision the resolver can trust. */
export function normalizeDecision(raw: {
  intent?: unknown;
  targetId?: unknown;
  content?: unknown;
  reasoning?: unknown;
}): AgentDecision {
  const intent = isActionIntent(raw.intent) ? raw.intent : "idle";
  return {
    intent,
    targetId: TARGETED_INTENTS.includes(intent) ? normalizeTarget(raw.targetId) : null,
    content: typeof raw.content === "string" ? raw.content : "",
    reasoning: typeof raw.reasoning === "string" ? raw.reasoning : "",
  };
}

export function fallbackPersona(seq: number): Persona {
  return {
    name: `Wanderer ${seq}`,
    species: "Ember Wisp",
    homeRealm: "The Grey Between",
    personality: ["quiet", "watchful"],
    quirk: "Flickers when nervous",
    ability: "Glows faintly in the dark",
    backstory: "Nobody remembers where this one came from.",
    openingGoal: "Survive long enough to find a friend.",
    speechStyle: "Short, hesitant sentences.",
  };
}
