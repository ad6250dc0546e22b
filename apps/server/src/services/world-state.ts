import {
  AGENT_ID_PREFIX,
  BOND_ID_PREFIX,
  MISSION_ID_PREFIX,
  benefactorRegenPerTick,
  formatEntityId,
  initialBenefactorBalance,
  type Agent,
  type Bond,
  type Mission,
  type MissionCompletionReason,
  type Persona,
  type PublicAgentInfo,
  type VisibilityBuffer,
  type WorldState,
} from "@spark-world/shared";
import { InvariantViolationError } from "../lib/errors.js";

export function emptyBuffer(tick: number): VisibilityBuffer {
  return {
    tick,
    mail: [],
    grantRequests: [],
    actions: [],
    events: [],
    news: {
      tick,
      agentsVanished: [],
      agentsSpawned: [],
      bondsFormed: [],
      bondsDissolved: [],
    },
  };
}

/** A world at tick 0 with no minds yet; genesis adds them one by one. */
export function createWorld(
  simulationId: string,
  name: string,
  numAgents: number
): WorldState {
  return {
    simulationId,
    name,
    tick: 0,
    agents: {},
    bonds: {},
    missions: {},
    benefactor: {
      balance: initialBenefactorBalance(numAgents),
      regenPerTick: benefactorRegenPerTick(numAgents),
    },
    visibility: {
      current: emptyBuffer(1),
      frozen: emptyBuffer(0),
    },
    counters: { nextAgentSeq: 1, nextBondSeq: 1, nextMissionSeq: 1 },
    totals: {
      totalSparksMinted: 0,
      totalSparksLost: 0,
      totalRaidsAttempted: 0,
      totalBondsFormed: 0,
    },
  };
}

export function cloneWorld(world: WorldState): WorldState {
  return structuredClone(world);
}

export function addAgent(
  world: WorldState,
  persona: Persona,
  options: { sparks: number; parentId: string | null }
): Agent {
  const id = formatEntityId(AGENT_ID_PREFIX, world.counters.nextAgentSeq);
  world.counters.nextAgentSeq += 1;

  const agent: Agent = {
    ...persona,
    personality: [...persona.personality],
    id,
    parentId: options.parentId,
    sparks: options.sparks,
    age: 0,
    status: "alive",
    bondStatus: "unbonded",
    bondMates: [],
    bornTick: world.tick,
    vanishedTick: null,
  };
  world.agents[id] = agent;
  return agent;
}

export function nextBondId(world: WorldState): string {
  const id = formatEntityId(BOND_ID_PREFIX, world.counters.nextBondSeq);
  world.counters.nextBondSeq += 1;
  return id;
}

export function nextMissionId(world: WorldState): string {
  const id = formatEntityId(MISSION_ID_PREFIX, world.counters.nextMissionSeq);
  world.counters.nextMissionSeq += 1;
  return id;
}

// Lookups go through hasOwn: ids arrive from oracles as free text
export function findAgent(world: WorldState, id: string): Agent | undefined {
  return Object.hasOwn(world.agents, id) ? world.agents[id] : undefined;
}

export function findBond(world: WorldState, id: string): Bond | undefined {
  return Object.hasOwn(world.bonds, id) ? world.bonds[id] : undefined;
}

export function findMission(world: WorldState, id: string): Mission | undefined {
  return Object.hasOwn(world.missions, id) ? world.missions[id] : undefined;
}

export function requireAgent(world: WorldState, id: string): Agent {
  const agent = findAgent(world, id);
  if (!agent) {
    throw new InvariantViolationError(`agent ${id} does not exist`);
  }
  return agent;
}

export function byId<T extends { id: string }>(a: T, b: T): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function aliveAgents(world: WorldState): Agent[] {
  return Object.values(world.agents)
    .filter((a) => a.status === "alive")
    .sort(byId);
}

export function liveBonds(world: WorldState): Bond[] {
  return Object.values(world.bonds).sort(byId);
}

export function bondsContaining(world: WorldState, agentId: string): Bond[] {
  return liveBonds(world).filter((b) => b.members.includes(agentId));
}

export function toPublicInfo(agent: Agent): PublicAgentInfo {
  return {
    id: agent.id,
    name: agent.name,
    species: agent.species,
    homeRealm: agent.homeRealm,
    sparks: agent.sparks,
    age: agent.age,
    status: agent.status,
    bondStatus: agent.bondStatus,
  };
}

/** The only way a mission becomes complete. Complete missions never change again. */
export function completeMission(
  mission: Mission,
  tick: number,
  reason: MissionCompletionReason
): void {
  if (mission.isComplete) {
    throw new InvariantViolationError(
      `mission ${mission.id} is already complete`
    );
  }
  mission.isComplete = true;
  mission.completedTick = tick;
  mission.completionReason = reason;
}
