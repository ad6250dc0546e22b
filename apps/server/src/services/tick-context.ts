import {
  type AgentEvent,
  type DropReason,
  type LedgerEntry,
  type PendingAction,
  type TickReport,
  type TickStage,
  type WorldState,
} from "@spark-world/shared";
import type { RandomSource } from "../lib/random.js";
import { findAgent } from "./world-state.js";

/** Mutable scratch space for one tick: the world being advanced and the report being filled. */
export interface TickContext {
  world: WorldState;
  tick: number;
  random: RandomSource;
  report: TickReport;
}

export function createTickContext(
  world: WorldState,
  random: RandomSource
): TickContext {
  const stages: Record<TickStage, string> = {
    upkeep_and_mint: "skipped",
    benefactor_grants: "skipped",
    agent_decisions: "skipped",
    spark_distribution: "skipped",
    action_resolution: "skipped",
    report: "skipped",
  };

  return {
    world,
    tick: world.tick,
    random,
    report: {
      simulationId: world.simulationId,
      tick: world.tick,
      stages,
      decisions: [],
      droppedActions: [],
      ledger: [],
      raids: [],
      grants: [],
      grantRefusals: [],
      bondsFormed: [],
      bondsDissolved: [],
      agentsVanished: [],
      agentsSpawned: [],
      missionsCreated: [],
      missionsCompleted: [],
      oracleFailures: [],
      sparksMinted: 0,
      sparksLost: 0,
      benefactorBalance: world.benefactor.balance,
      aliveAgents: 0,
    },
  };
}

export function recordLedger(
  ctx: TickContext,
  entry: Omit<LedgerEntry, "tick">
): void {
  ctx.report.ledger.push({ tick: ctx.tick, ...entry });
}

/** Queue a per-agent event; the agent sees it in next tick's observation. */
export function recordEvent(
  ctx: TickContext,
  event: Omit<AgentEvent, "tick">
): void {
  ctx.world.visibility.current.events.push({ tick: ctx.tick, ...event });
}

export function dropAction(
  ctx: TickContext,
  action: PendingAction,
  reason: DropReason
): void {
  ctx.report.droppedActions.push({
    agentId: action.agentId,
    intent: action.intent,
    targetId: action.targetId,
    reason,
    tick: ctx.tick,
  });
  recordEvent(ctx, {
    agentId: action.agentId,
    type: "action_dropped",
    description: `Your ${action.intent} had no effect (${reason})`,
    sparkChange: 0,
    sourceAgentId: null,
  });
  console.log(
    `[RESOLVE] Dropped ${action.intent} from ${action.agentId}${action.targetId ? ` -> ${action.targetId}` : ""}: ${reason}`
  );
}

/** Common target checks for intents that name another mind. */
export function checkTarget(
  world: WorldState,
  action: PendingAction
): DropReason | null {
  if (!action.targetId) return "missing_target";
  if (action.targetId === action.agentId) return "self_target";
  const target = findAgent(world, action.targetId);
  if (!target) return "unknown_target";
  if (target.status !== "alive") return "target_vanished";
  return null;
}
