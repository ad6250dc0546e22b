/**
 * Bonding protocol tests. Requests live in the frozen mail table; an accept
 * this tick consumes the matching request from last tick.
 */
import { describe, it, expect, vi, beforeEach } from "vitest";
import type { WorldState } from "@spark-world/shared";
import { queueBondRequest, resolveBondAccepts } from "../src/services/bonding-protocol.js";
import { agent, bondAgents, makeAction, makeContext, makeWorld } from "./helpers.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

function withRequests(world: WorldState, pairs: Array<[string, string]>): void {
  for (const [from, to] of pairs) {
    world.visibility.frozen.mail.push(makeAction(from, "bond-request", to, world.tick - 1));
  }
}

describe("resolveBondAccepts", () => {
  it("forms a bond from an accepted request and consumes the request", () => {
    const world = makeWorld([3, 3], 2);
    withRequests(world, [["agent_001", "agent_002"]]);
    const ctx = makeContext(world);

    const bonds = resolveBondAccepts(ctx, [makeAction("agent_002", "bond-accept", "agent_001", 2)]);

    expect(bonds).toEqual([
      {
        id: "bond_001",
        members: ["agent_001", "agent_002"],
        leaderId: "agent_001",
        missionId: null,
        sparksGeneratedThisTick: 0,
        createdTick: 2,
      },
    ]);
    expect(agent(world, "agent_001")).toMatchObject({ bondStatus: "leader", bondMates: ["agent_002"] });
    expect(agent(world, "agent_002")).toMatchObject({ bondStatus: "bonded", bondMates: ["agent_001"] });
    expect(world.visibility.frozen.mail).toEqual([]);
    expect(world.visibility.current.news.bondsFormed).toEqual(["bond_001"]);
    expect(world.totals.totalBondsFormed).toBe(1);
  });

  it("merges chained accepts into one clique", () => {
    const world = makeWorld([3, 3, 3], 2);
    withRequests(world, [
      ["agent_001", "agent_002"],
      ["agent_002", "agent_003"],
    ]);
    const ctx = makeContext(world);

    const bonds = resolveBondAccepts(ctx, [
      makeAction("agent_002", "bond-accept", "agent_001", 2),
      makeAction("agent_003", "bond-accept", "agent_002", 2),
    ]);

    expect(bonds.map((b) => b.members)).toEqual([["agent_001", "agent_002", "agent_003"]]);
    expect(agent(world, "agent_002").bondMates).toEqual(["agent_001", "agent_003"]);
  });

  it("keeps disjoint pairs as separate bonds ordered by lowest member", () => {
    const world = makeWorld([3, 3, 3, 3], 2);
    withRequests(world, [
      ["agent_004", "agent_003"],
      ["agent_001", "agent_002"],
    ]);
    const ctx = makeContext(world);

    const bonds = resolveBondAccepts(ctx, [
      makeAction("agent_003", "bond-accept", "agent_004", 2),
      makeAction("agent_002", "bond-accept", "agent_001", 2),
    ]);

    expect(bonds.map((b) => [b.id, b.members])).toEqual([
      ["bond_001", ["agent_001", "agent_002"]],
      ["bond_002", ["agent_003", "agent_004"]],
    ]);
  });

  it("drops an accept with no visible request", () => {
    const world = makeWorld([3, 3], 2);
    const ctx = makeContext(world);

    expect(resolveBondAccepts(ctx, [makeAction("agent_002", "bond-accept", "agent_001", 2)])).toEqual([]);
    expect(ctx.report.droppedActions).toEqual([
      { agentId: "agent_002", intent: "bond-accept", targetId: "agent_001", reason: "no_pending_request", tick: 2 },
    ]);
    expect(world.visibility.current.events[0].description).toBe(
      "Your bond-accept had no effect (no_pending_request)"
    );
  });

  it("ignores a request made during the current tick", () => {
    const world = makeWorld([3, 3], 2);
    world.visibility.frozen.mail.push(makeAction("agent_001", "bond-request", "agent_002", 2));
    const ctx = makeContext(world);

    resolveBondAccepts(ctx, [makeAction("agent_002", "bond-accept", "agent_001", 2)]);

    expect(ctx.report.droppedActions[0].reason).toBe("no_pending_request");
  });

  it("drops accepts from bonded minds and towards bonded minds", () => {
    const world = makeWorld([3, 3, 3, 3], 2);
    bondAgents(world, ["agent_002", "agent_003"]);
    withRequests(world, [
      ["agent_001", "agent_002"],
      ["agent_003", "agent_004"],
    ]);
    const ctx = makeContext(world);

    resolveBondAccepts(ctx, [
      makeAction("agent_002", "bond-accept", "agent_001", 2),
      makeAction("agent_004", "bond-accept", "agent_003", 2),
    ]);

    expect(ctx.report.droppedActions.map((d) => d.reason)).toEqual(["already_bonded", "target_bonded"]);
    expect(world.visibility.frozen.mail).toHaveLength(2);
  });

  it("drops malformed targets", () => {
    const world = makeWorld([3, 3], 2);
    agent(world, "agent_002").status = "vanished";
    const ctx = makeContext(world);

    resolveBondAccepts(ctx, [
      makeAction("agent_001", "bond-accept", null, 2),
      makeAction("agent_001", "bond-accept", "agent_001", 2),
      makeAction("agent_001", "bond-accept", "agent_999", 2),
      makeAction("agent_001", "bond-accept", "agent_002", 2),
    ]);

    expect(ctx.report.droppedActions.map((d) => d.reason)).toEqual([
      "missing_target",
      "self_target",
      "unknown_target",
      "target_vanished",
    ]);
  });
});

describe("queueBondRequest", () => {
  it("queues a request for the target to see next tick", () => {
    const world = makeWorld([3, 3], 2);
    const ctx = makeContext(world);

    expect(queueBondRequest(ctx, makeAction("agent_001", "bond-request", "agent_002", 2))).toBe(true);
    expect(world.visibility.current.mail).toHaveLength(1);
    expect(world.visibility.current.mail[0]).toMatchObject({
      agentId: "agent_001",
      targetId: "agent_002",
      intent: "bond-request",
      tick: 2,
    });
  });

  it("refuses requests involving bonded minds", () => {
    const world = makeWorld([3, 3, 3], 2);
    bondAgents(world, ["agent_001", "agent_002"]);
    const ctx = makeContext(world);

    expect(queueBondRequest(ctx, makeAction("agent_001", "bond-request", "agent_003", 2))).toBe(false);
    expect(queueBondRequest(ctx, makeAction("agent_003", "bond-request", "agent_002", 2))).toBe(false);
    expect(ctx.report.droppedActions.map((d) => d.reason)).toEqual(["already_bonded", "target_bonded"]);
    expect(world.visibility.current.mail).toEqual([]);
  });
});
