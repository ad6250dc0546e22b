import {
  CHILD_STARTING_SPARKS,
  SPAWN_COST,
  type Agent,
  type DropReason,
  type PendingAction,
  type Persona,
} from "@spark-world/shared";
import type { TickContext } from "./tick-context.js";
import { recordEvent, recordLedger } from "./tick-context.js";
import { addAgent, requireAgent } from "./world-state.js";

/** Only bonded minds with enough sparks may spawn. Checked before any persona is generated. */
export function checkSpawn(ctx: TickContext, action: PendingAction): DropReason | null {
  const parent = requireAgent(ctx.world, action.agentId);
  if (parent.bondStatus === "unbonded") return "not_bonded";
  if (parent.sparks < SPAWN_COST) return "insufficient_sparks";
  return null;
}

/**
 * Charge the parent and add the child. The child starts at age 0 and takes
 * its first decision next tick.
 */
export function replicateAgent(
  ctx: TickContext,
  action: PendingAction,
  persona: Persona
): Agent {
  const { world } = ctx;
  const parent = requireAgent(world, action.agentId);

  parent.sparks -= SPAWN_COST;
  recordLedger(ctx, {
    from: parent.id,
    to: "spawn",
    amount: SPAWN_COST,
    reason: "spawn_cost",
    note: `Spawning a new mind`,
  });

  const child = addAgent(world, persona, {
    sparks: CHILD_STARTING_SPARKS,
    parentId: parent.id,
  });
  recordLedger(ctx, {
    from: "spawn",
    to: child.id,
    amount: CHILD_STARTING_SPARKS,
    reason: "birth_grant",
    note: `Born to ${parent.name}`,
  });

  recordEvent(ctx, {
    agentId: parent.id,
    type: "child_spawned",
    description: `You spawned ${child.name} (${child.id})`,
    sparkChange: -SPAWN_COST,
    sourceAgentId: child.id,
  });

  ctx.report.agentsSpawned.push({
    parentId: parent.id,
    childId: child.id,
    childName: child.name,
  });
  world.visibility.current.news.agentsSpawned.push(child.id);

  console.log(
    `[REPLICATOR] ${parent.name} (${parent.id}) spawned ${child.name} (${child.id}). Parent balance: ${parent.sparks}`
  );
  return child;
}
