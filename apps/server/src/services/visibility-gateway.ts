import {
  ACTION_INTENTS,
  MAX_GRANT_PER_REQUEST,
  SPAWN_COST,
  UPKEEP_PER_TICK,
  type ActionIntent,
  type Agent,
  type GameRules,
  type GrantOutcome,
  type Observation,
  type PendingAction,
  type WorldState,
} from "@spark-world/shared";
import { InvariantViolationError } from "../lib/errors.js";
import { missionStatusFor } from "./mission-lifecycle.js";
import type { TickContext } from "./tick-context.js";
import { checkTarget, dropAction } from "./tick-context.js";
import { byId, emptyBuffer, requireAgent, toPublicInfo } from "./world-state.js";

export const GAME_RULES: GameRules = {
  upkeepPerTick: UPKEEP_PER_TICK,
  bondMintFormula: "each bond mints one spark per member every tick, dealt to random members",
  raidStrengthFormula: "strength = age + sparks; success chance = yours / (yours + theirs)",
  spawnCost: SPAWN_COST,
  maxGrantPerRequest: MAX_GRANT_PER_REQUEST,
};

function availableActions(world: WorldState, agent: Agent, inbox: PendingAction[]): ActionIntent[] {
  const others = Object.values(world.agents).filter(
    (a) => a.id !== agent.id && a.status === "alive"
  );
  const unbonded = agent.bondStatus === "unbonded";

  const allowed = new Set<ActionIntent>(["request-grant", "idle"]);
  if (others.length > 0) {
    allowed.add("raid");
    allowed.add("message");
  }
  if (unbonded && others.some((a) => a.bondStatus === "unbonded")) {
    allowed.add("bond-request");
  }
  if (unbonded && inbox.some((m) => m.intent === "bond-request")) {
    allowed.add("bond-accept");
  }
  if (!unbonded && agent.sparks >= SPAWN_COST) {
    allowed.add("spawn");
  }
  return ACTION_INTENTS.filter((intent) => allowed.has(intent));
}

/**
 * What one agent may know at the start of its decision: the frozen
 * generation (produced last tick) and the grant answers computed this tick.
 * Nothing written to the current generation is reachable from here.
 */
export function buildObservation(
  world: WorldState,
  agentId: string,
  grantOutcomes: GrantOutcome[] = []
): Observation {
  const agent = requireAgent(world, agentId);
  const { frozen } = world.visibility;
  const inbox = frozen.mail.filter((m) => m.targetId === agentId);

  return {
    tick: world.tick,
    self: structuredClone(agent),
    inbox: structuredClone(inbox),
    grantOutcomes: structuredClone(grantOutcomes.filter((g) => g.agentId === agentId)),
    eventsSinceLast: structuredClone(frozen.events.filter((e) => e.agentId === agentId)),
    news: structuredClone(frozen.news),
    publicAgents: Object.values(world.agents)
      .filter((a) => a.id !== agentId)
      .sort(byId)
      .map(toPublicInfo),
    mission: missionStatusFor(world, agentId),
    availableActions: availableActions(world, agent, inbox),
    rules: GAME_RULES,
  };
}

/** Queue a message for the target's next observation. */
export function enqueueMail(ctx: TickContext, action: PendingAction): boolean {
  const problem = checkTarget(ctx.world, action);
  if (problem) {
    dropAction(ctx, action, problem);
    return false;
  }
  ctx.world.visibility.current.mail.push({ ...action, tick: ctx.tick });
  return true;
}

/** Queue a grant request for the benefactor to answer next tick. */
export function enqueueGrantRequest(ctx: TickContext, action: PendingAction): void {
  ctx.world.visibility.current.grantRequests.push({ ...action, tick: ctx.tick });
}

export function recordActions(ctx: TickContext, actions: PendingAction[]): void {
  ctx.world.visibility.current.actions.push(...actions);
}

/** The decisions of the given agents made during the previous tick. */
export function previousActionsOf(world: WorldState, agentIds: string[]): PendingAction[] {
  return world.visibility.frozen.actions.filter((a) => agentIds.includes(a.agentId));
}

/**
 * End-of-tick swap. The current generation becomes visible and a fresh one
 * is opened for the next tick; last tick's frozen data is discarded along
 * with any bond requests nobody accepted.
 */
export function swapBuffers(world: WorldState): void {
  if (world.visibility.current.tick !== world.tick) {
    throw new InvariantViolationError(
      `current buffer belongs to tick ${world.visibility.current.tick}, world is at ${world.tick}`
    );
  }
  world.visibility = {
    frozen: world.visibility.current,
    current: emptyBuffer(world.tick + 1),
  };
}
