import type {
  Agent,
  AgentDecision,
  Bond,
  GrantDecision,
  Mission,
  MissionContent,
  Observation,
  PendingAction,
  Persona,
  TickReport,
  WorldState,
} from "@spark-world/shared";
import type { RandomSource } from "../src/lib/random.js";
import type { MeetingOutcome, MissionEvaluation } from "../src/services/mission-lifecycle.js";
import type { NarrativeReporter } from "../src/services/narrative-reporter.js";
import type {
  BenefactorOracle,
  CharacterGenerator,
  DecisionOracle,
  GrantContext,
  MissionOracle,
  Oracles,
  SpawnContext,
} from "../src/services/oracles.js";
import { createTickContext, type TickContext } from "../src/services/tick-context.js";
import { addAgent, createWorld, emptyBuffer } from "../src/services/world-state.js";

export function makePersona(name: string): Persona {
  return {
    name,
    species: "Test Sprite",
    homeRealm: "The Fixture Fields",
    personality: ["plain"],
    quirk: "None",
    ability: "None",
    backstory: "Made for a test.",
    openingGoal: "Pass.",
    speechStyle: "Flat.",
  };
}

/** A world at `tick` with one agent per entry, ids agent_001, agent_002, ... */
export function makeWorld(sparks: number[], tick = 1): WorldState {
  const world = createWorld("sim-test", "Test World", sparks.length);
  sparks.forEach((s, i) => {
    addAgent(world, makePersona(`Agent ${i + 1}`), { sparks: s, parentId: null });
  });
  world.tick = tick;
  world.visibility = { current: emptyBuffer(tick), frozen: emptyBuffer(tick - 1) };
  return world;
}

export function agent(world: WorldState, id: string): Agent {
  const found = world.agents[id];
  if (!found) throw new Error(`fixture has no ${id}`);
  return found;
}

/** Bond the given agents directly, bypassing the request/accept protocol. */
export function bondAgents(world: WorldState, members: string[], createdTick = 0): Bond {
  const sorted = [...members].sort();
  const id = `bond_${String(world.counters.nextBondSeq).padStart(3, "0")}`;
  world.counters.nextBondSeq += 1;
  const bond: Bond = {
    id,
    members: sorted,
    leaderId: sorted[0],
    missionId: null,
    sparksGeneratedThisTick: 0,
    createdTick,
  };
  world.bonds[id] = bond;
  for (const memberId of sorted) {
    const member = agent(world, memberId);
    member.bondStatus = memberId === bond.leaderId ? "leader" : "bonded";
    member.bondMates = sorted.filter((m) => m !== memberId);
  }
  return bond;
}

export function attachMission(world: WorldState, bond: Bond, createdTick = 0): Mission {
  const id = `mission_${String(world.counters.nextMissionSeq).padStart(3, "0")}`;
  world.counters.nextMissionSeq += 1;
  const mission: Mission = {
    id,
    bondId: bond.id,
    title: "Test Mission",
    description: "A mission for tests",
    goal: "Finish the test",
    leaderId: bond.leaderId,
    currentProgress: "Mission just started",
    assignedTasks: {},
    isComplete: false,
    createdTick,
    completedTick: null,
    completionReason: null,
  };
  world.missions[id] = mission;
  bond.missionId = id;
  return mission;
}

export function makeAction(
  agentId: string,
  intent: PendingAction["intent"],
  targetId: string | null = null,
  tick = 1
): PendingAction {
  return { agentId, intent, targetId, content: `${intent} from ${agentId}`, reasoning: "test", tick };
}

/** Returns the given values in order and fails loudly when a test draws more than it planned. */
export function sequence(...values: number[]): RandomSource {
  let i = 0;
  return () => {
    if (i >= values.length) throw new Error(`random drawn ${i + 1} times, only ${values.length} planned`);
    return values[i++];
  };
}

/** Small seeded generator for statistical tests. */
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function makeContext(world: WorldState, random: RandomSource = sequence()): TickContext {
  return createTickContext(world, random);
}

type DecisionScript = (observation: Observation, signal: AbortSignal) => AgentDecision | Promise<AgentDecision>;

export const idle: AgentDecision = { intent: "idle", targetId: null, content: "", reasoning: "" };

/** Oracles driven entirely by the test. Every call is recorded. */
export class ScriptedOracles
  implements DecisionOracle, BenefactorOracle, CharacterGenerator, MissionOracle
{
  decisions: Record<string, DecisionScript> = {};
  grants: (context: GrantContext) => GrantDecision[] | Promise<GrantDecision[]> = () => [];
  personas: (context: SpawnContext) => Persona | Promise<Persona> = (context) =>
    makePersona(`Mind ${context.existingNames.length + 1}`);
  evaluation: (mission: Mission) => MissionEvaluation | Promise<MissionEvaluation> = () => ({
    isComplete: false,
    progressSummary: "",
  });
  meeting: (mission: Mission) => MeetingOutcome | Promise<MeetingOutcome> = () => ({
    progressNote: null,
    assignedTasks: {},
  });
  missionContent: MissionContent = { title: "Shared Light", description: "Stay lit", goal: "Survive" };

  readonly observations: Observation[] = [];
  readonly grantCalls: GrantContext[] = [];
  readonly meetings: string[] = [];
  readonly evaluations: string[] = [];

  async decide(agentId: string, observation: Observation, signal: AbortSignal): Promise<AgentDecision> {
    this.observations.push(observation);
    const script = this.decisions[agentId];
    return script ? script(observation, signal) : idle;
  }

  async decideGrants(context: GrantContext): Promise<GrantDecision[]> {
    this.grantCalls.push(context);
    return this.grants(context);
  }

  async spawn(context: SpawnContext): Promise<Persona> {
    return this.personas(context);
  }

  async generateMission(): Promise<MissionContent> {
    return this.missionContent;
  }

  async evaluateProgress(mission: Mission): Promise<MissionEvaluation> {
    this.evaluations.push(mission.id);
    return this.evaluation(mission);
  }

  async coordinateMeeting(mission: Mission): Promise<MeetingOutcome> {
    this.meetings.push(mission.id);
    return this.meeting(mission);
  }

  observationsOf(agentId: string): Observation[] {
    return this.observations.filter((o) => o.self.id === agentId);
  }

  asOracles(): Oracles {
    return { decisions: this, benefactor: this, characters: this, missions: this };
  }
}

export class RecordingReporter implements NarrativeReporter {
  readonly reports: TickReport[] = [];

  async publish(report: TickReport): Promise<void> {
    this.reports.push(report);
  }
}
