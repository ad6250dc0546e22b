import type { BondDissolutionReason } from "@spark-world/shared";
import type { TickContext } from "./tick-context.js";
import { recordEvent } from "./tick-context.js";
import {
  aliveAgents,
  bondsContaining,
  completeMission,
  findAgent,
  findBond,
  findMission,
  requireAgent,
} from "./world-state.js";

/**
 * Delete a bond: every member goes back to unbonded and the bond's mission
 * is closed. Used both when a member vanishes and when a mission succeeds.
 */
export function dissolveBond(
  ctx: TickContext,
  bondId: string,
  reason: BondDissolutionReason,
  vanishedAgentId: string | null = null
): void {
  const { world } = ctx;
  const bond = findBond(world, bondId);
  if (!bond) return;

  for (const memberId of bond.members) {
    const member = findAgent(world, memberId);
    if (!member) continue;
    member.bondStatus = "unbonded";
    member.bondMates = [];

    if (memberId !== vanishedAgentId) {
      recordEvent(ctx, {
        agentId: memberId,
        type: "bond_dissolved",
        description:
          reason === "member_vanished" && vanishedAgentId
            ? `Your bond ${bond.id} dissolved: ${vanishedAgentId} vanished`
            : `Your bond ${bond.id} dissolved: its mission is complete`,
        sparkChange: 0,
        sourceAgentId: vanishedAgentId,
      });
    }
  }

  delete world.bonds[bondId];

  const mission = bond.missionId ? findMission(world, bond.missionId) : undefined;
  if (mission && !mission.isComplete) {
    completeMission(mission, ctx.tick, "bond_dissolved");
    ctx.report.missionsCompleted.push({
      missionId: mission.id,
      bondId: bond.id,
      reason: "bond_dissolved",
    });
  }

  ctx.report.bondsDissolved.push({
    bondId: bond.id,
    members: [...bond.members],
    missionId: bond.missionId,
    reason,
    vanishedAgentId,
  });
  world.visibility.current.news.bondsDissolved.push(bond.id);

  console.log(`[REAPER] Bond ${bond.id} dissolved (${reason}).`);
}

/** Mark one mind vanished and tear down every bond it belonged to, in the same tick. */
export function vanishAgent(ctx: TickContext, agentId: string): void {
  const agent = requireAgent(ctx.world, agentId);
  if (agent.status === "vanished") return;

  agent.status = "vanished";
  agent.vanishedTick = ctx.tick;

  for (const bond of bondsContaining(ctx.world, agentId)) {
    dissolveBond(ctx, bond.id, "member_vanished", agentId);
  }
  agent.bondStatus = "unbonded";
  agent.bondMates = [];

  ctx.report.agentsVanished.push(agentId);
  ctx.world.visibility.current.news.agentsVanished.push(agentId);

  console.log(
    `[REAPER] ${agent.name} (${agent.id}) has vanished with ${agent.sparks} sparks at age ${agent.age}.`
  );
}

/** Vanish every living mind whose balance reached zero. Returns the ids reaped. */
export function reapDepletedAgents(ctx: TickContext): string[] {
  const depleted = aliveAgents(ctx.world).filter((a) => a.sparks <= 0);
  for (const agent of depleted) {
    vanishAgent(ctx, agent.id);
  }
  return depleted.map((a) => a.id);
}
