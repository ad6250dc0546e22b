import { z } from "zod";
import type { WorldState } from "@spark-world/shared";

const count = z.number().int().nonnegative();

const agentSchema = z.object({
  id: z.string(),
  name: z.string(),
  species: z.string(),
  homeRealm: z.string(),
  personality: z.array(z.string()),
  quirk: z.string(),
  ability: z.string(),
  backstory: z.string(),
  openingGoal: z.string(),
  speechStyle: z.string(),
  parentId: z.string().nullable(),
  sparks: z.number().int(),
  age: count,
  status: z.enum(["alive", "vanished"]),
  bondStatus: z.enum(["unbonded", "bonded", "leader"]),
  bondMates: z.array(z.string()),
  bornTick: count,
  vanishedTick: count.nullable(),
});

const bondSchema = z.object({
  id: z.string(),
  members: z.array(z.string()).min(2),
  leaderId: z.string(),
  missionId: z.string().nullable(),
  sparksGeneratedThisTick: count,
  createdTick: count,
});

const missionSchema = z.object({
  id: z.string(),
  bondId: z.string(),
  title: z.string(),
  description: z.string(),
  goal: z.string(),
  leaderId: z.string(),
  currentProgress: z.string(),
  assignedTasks: z.record(z.string(), z.string()),
  isComplete: z.boolean(),
  createdTick: count,
  completedTick: count.nullable(),
  completionReason: z.enum(["goal_met", "bond_dissolved"]).nullable(),
});

const pendingActionSchema = z.object({
  agentId: z.string(),
  intent: z.enum([
    "bond-request",
    "bond-accept",
    "raid",
    "spawn",
    "request-grant",
    "message",
    "idle",
  ]),
  targetId: z.string().nullable(),
  content: z.string(),
  reasoning: z.string(),
  tick: count,
});

const agentEventSchema = z.object({
  tick: count,
  agentId: z.string(),
  type: z.enum([
    "raid_attack",
    "raid_defense",
    "bond_formed",
    "bond_dissolved",
    "child_spawned",
    "grant_received",
    "action_dropped",
  ]),
  description: z.string(),
  sparkChange: z.number().int(),
  sourceAgentId: z.string().nullable(),
});

const bufferSchema = z.object({
  tick: count,
  mail: z.array(pendingActionSchema),
  grantRequests: z.array(pendingActionSchema),
  actions: z.array(pendingActionSchema),
  events: z.array(agentEventSchema),
  news: z.object({
    tick: count,
    agentsVanished: z.array(z.string()),
    agentsSpawned: z.array(z.string()),
    bondsFormed: z.array(z.string()),
    bondsDissolved: z.array(z.string()),
  }),
});

export const worldStateSchema: z.ZodType<WorldState> = z.object({
  simulationId: z.string(),
  name: z.string(),
  tick: count,
  agents: z.record(z.string(), agentSchema),
  bonds: z.record(z.string(), bondSchema),
  missions: z.record(z.string(), missionSchema),
  benefactor: z.object({
    balance: count,
    regenPerTick: count,
  }),
  visibility: z.object({
    current: bufferSchema,
    frozen: bufferSchema,
  }),
  counters: z.object({
    nextAgentSeq: z.number().int().positive(),
    nextBondSeq: z.number().int().positive(),
    nextMissionSeq: z.number().int().positive(),
  }),
  totals: z.object({
    totalSparksMinted: count,
    totalSparksLost: count,
    totalRaidsAttempted: count,
    totalBondsFormed: count,
  }),
});

export function serializeWorld(world: WorldState): string {
  return JSON.stringify(world);
}

/** Validate a stored snapshot. Throws a ZodError when the shape is off. */
export function parseWorld(value: unknown): WorldState {
  return worldStateSchema.parse(value);
}

export function deserializeWorld(text: string): WorldState {
  return parseWorld(JSON.parse(text));
}
