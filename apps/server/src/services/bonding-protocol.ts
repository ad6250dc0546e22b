import type { Bond, DropReason, PendingAction, WorldState } from "@spark-world/shared";
import type { TickContext } from "./tick-context.js";
import { checkTarget, dropAction, recordEvent } from "./tick-context.js";
import { findAgent, nextBondId, requireAgent } from "./world-state.js";

/** The visible bond request an accept refers to, if there is one. */
function findPendingRequest(
  world: WorldState,
  requesterId: string,
  accepterId: string
): PendingAction | undefined {
  return world.visibility.frozen.mail.find(
    (m) =>
      m.intent === "bond-request" &&
      m.agentId === requesterId &&
      m.targetId === accepterId &&
      m.tick < world.tick
  );
}

function checkAccept(world: WorldState, accept: PendingAction): DropReason | null {
  const targetProblem = checkTarget(world, accept);
  if (targetProblem || !accept.targetId) return targetProblem ?? "missing_target";

  if (!findPendingRequest(world, accept.targetId, accept.agentId)) {
    return "no_pending_request";
  }
  if (requireAgent(world, accept.agentId).bondStatus !== "unbonded") {
    return "already_bonded";
  }
  if (requireAgent(world, accept.targetId).bondStatus !== "unbonded") {
    return "target_bonded";
  }
  return null;
}

// Disjoint sets keyed by agent id
class Cliques {
  private parent = new Map<string, string>();

  find(id: string): string {
    let root = this.parent.get(id) ?? id;
    if (root !== id) {
      root = this.find(root);
      this.parent.set(id, root);
    }
    return root;
  }

  union(a: string, b: string): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    // smaller id becomes the root so results do not depend on edge order
    if (ra < rb) this.parent.set(rb, ra);
    else this.parent.set(ra, rb);
  }

  groups(): string[][] {
    const byRoot = new Map<string, string[]>();
    for (const id of this.parent.keys()) {
      const root = this.find(id);
      const group = byRoot.get(root) ?? [];
      group.push(id);
      byRoot.set(root, group);
    }
    return [...byRoot.values()]
      .map((g) => g.sort())
      .sort((a, b) => (a[0] < b[0] ? -1 : 1));
  }

  link(a: string, b: string): void {
    if (!this.parent.has(a)) this.parent.set(a, a);
    if (!this.parent.has(b)) this.parent.set(b, b);
    this.union(a, b);
  }
}

function formBond(ctx: TickContext, members: string[]): Bond {
  const { world } = ctx;
  const leaderId = members[0];
  const bond: Bond = {
    id: nextBondId(world),
    members,
    leaderId,
    missionId: null,
    sparksGeneratedThisTick: 0,
    createdTick: ctx.tick,
  };
  world.bonds[bond.id] = bond;

  for (const memberId of members) {
    const member = requireAgent(world, memberId);
    member.bondStatus = memberId === leaderId ? "leader" : "bonded";
    member.bondMates = members.filter((id) => id !== memberId);

    recordEvent(ctx, {
      agentId: memberId,
      type: "bond_formed",
      description: `You joined bond ${bond.id} with ${member.bondMates.join(", ")}`,
      sparkChange: 0,
      sourceAgentId: memberId === leaderId ? null : leaderId,
    });
  }

  world.totals.totalBondsFormed += 1;
  world.visibility.current.news.bondsFormed.push(bond.id);
  console.log(
    `[BONDING] Bond ${bond.id} formed: ${members.join(", ")} (leader ${leaderId})`
  );
  return bond;
}

/**
 * Resolve this tick's accepts. Valid accept edges are merged transitively,
 * so A<->B and B<->C in the same tick yield one bond {A, B, C}. Consumed
 * requests leave the frozen table. Missions are attached by the caller.
 */
export function resolveBondAccepts(
  ctx: TickContext,
  accepts: PendingAction[]
): Bond[] {
  const { world } = ctx;
  const cliques = new Cliques();
  const consumed = new Set<PendingAction>();

  for (const accept of accepts) {
    const problem = checkAccept(world, accept);
    if (problem || !accept.targetId) {
      dropAction(ctx, accept, problem ?? "missing_target");
      continue;
    }
    const request = findPendingRequest(world, accept.targetId, accept.agentId);
    if (request) consumed.add(request);
    cliques.link(accept.agentId, accept.targetId);
  }

  if (consumed.size > 0) {
    world.visibility.frozen.mail = world.visibility.frozen.mail.filter(
      (m) => !consumed.has(m)
    );
  }

  return cliques.groups().map((members) => formBond(ctx, members));
}

/**
 * Queue a new bond request for the target to see next tick. Runs after
 * accepts are resolved: a mind that just joined a clique cannot also court
 * someone else, and nobody can court a freshly bonded mind.
 */
export function queueBondRequest(ctx: TickContext, request: PendingAction): boolean {
  const { world } = ctx;
  const problem = checkTarget(world, request);
  if (problem || !request.targetId) {
    dropAction(ctx, request, problem ?? "missing_target");
    return false;
  }

  const requester = requireAgent(world, request.agentId);
  if (requester.bondStatus !== "unbonded") {
    dropAction(ctx, request, "already_bonded");
    return false;
  }
  const target = findAgent(world, request.targetId);
  if (!target || target.bondStatus !== "unbonded") {
    dropAction(ctx, request, "target_bonded");
    return false;
  }

  world.visibility.current.mail.push({ ...request, tick: ctx.tick });
  console.log(`[BONDING] ${request.agentId} asks ${request.targetId} to bond`);
  return true;
}
