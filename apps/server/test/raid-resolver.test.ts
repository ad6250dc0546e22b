import { describe, it, expect, vi, beforeEach } from "vitest";
import { raidStrength, raidSuccessProbability, resolveRaid } from "../src/services/raid-resolver.js";
import { agent, makeAction, makeContext, makeWorld, mulberry32, sequence } from "./helpers.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

describe("raidStrength", () => {
  it("adds age and sparks", () => {
    const world = makeWorld([2]);
    agent(world, "agent_001").age = 3;
    expect(raidStrength(agent(world, "agent_001"))).toBe(5);
  });

  it("falls back to an even chance when both sides have no strength", () => {
    expect(raidSuccessProbability(0, 0)).toBe(0.5);
    expect(raidSuccessProbability(3, 1)).toBe(0.75);
  });
});

describe("resolveRaid", () => {
  it("moves the stolen sparks to a winning attacker", () => {
    const world = makeWorld([10, 5]);
    const ctx = makeContext(world, sequence(0.1, 0.5));

    const result = resolveRaid(ctx, makeAction("agent_001", "raid", "agent_002"));

    expect(result).toEqual({
      tick: 1,
      attackerId: "agent_001",
      defenderId: "agent_002",
      outcome: "won",
      attackerStrength: 10,
      defenderStrength: 5,
      successProbability: 10 / 15,
      sparksTransferred: 3,
    });
    expect(agent(world, "agent_001").sparks).toBe(13);
    expect(agent(world, "agent_002").sparks).toBe(2);
    expect(ctx.report.ledger).toEqual([
      {
        tick: 1,
        from: "agent_002",
        to: "agent_001",
        amount: 3,
        reason: "raid_success",
        note: "Raid won 10 vs 5",
      },
    ]);
    expect(world.visibility.current.events.map((e) => [e.agentId, e.type, e.sparkChange])).toEqual([
      ["agent_001", "raid_attack", 3],
      ["agent_002", "raid_defense", -3],
    ]);
  });

  it("never steals more than the defender holds", () => {
    const world = makeWorld([10, 2]);
    const result = resolveRaid(makeContext(world, sequence(0.1, 0.99)), makeAction("agent_001", "raid", "agent_002"));

    expect(result?.sparksTransferred).toBe(2);
    expect(agent(world, "agent_002").sparks).toBe(0);
  });

  it("costs a losing attacker its stake", () => {
    const world = makeWorld([10, 5]);
    const result = resolveRaid(makeContext(world, sequence(0.9)), makeAction("agent_001", "raid", "agent_002"));

    expect(result?.outcome).toBe("lost");
    expect(result?.sparksTransferred).toBe(-1);
    expect(agent(world, "agent_001").sparks).toBe(9);
    expect(agent(world, "agent_002").sparks).toBe(6);
  });

  it("fails without a draw when the attacker has nothing to stake", () => {
    const world = makeWorld([0, 5]);
    const ctx = makeContext(world);

    const result = resolveRaid(ctx, makeAction("agent_001", "raid", "agent_002"));

    expect(result?.outcome).toBe("insufficient_stake");
    expect(result?.sparksTransferred).toBe(0);
    expect(agent(world, "agent_002").sparks).toBe(5);
    expect(world.totals.totalRaidsAttempted).toBe(1);
    expect(ctx.report.raids).toHaveLength(1);
  });

  it("drops a raid on a vanished mind", () => {
    const world = makeWorld([5, 5]);
    agent(world, "agent_002").status = "vanished";
    const ctx = makeContext(world);

    expect(resolveRaid(ctx, makeAction("agent_001", "raid", "agent_002"))).toBeNull();
    expect(ctx.report.droppedActions[0].reason).toBe("target_vanished");
    expect(world.totals.totalRaidsAttempted).toBe(0);
  });

  it("wins at the rate set by relative strength", () => {
    const random = mulberry32(20240501);
    const trials = 10_000;
    let wins = 0;

    for (let i = 0; i < trials; i++) {
      const world = makeWorld([10, 5]);
      const result = resolveRaid(makeContext(world, random), makeAction("agent_001", "raid", "agent_002"));
      if (result?.outcome === "won") wins += 1;
    }

    expect(Math.abs(wins / trials - 2 / 3)).toBeLessThan(0.02);
  });
});
