/**
 * Spark ledger tests: upkeep, bond minting and its audit, benefactor grants.
 */
import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  applyGrants,
  applyUpkeep,
  auditMinting,
  mintAndDistribute,
  regenerateBenefactor,
} from "../src/services/spark-ledger.js";
import { InvariantViolationError } from "../src/lib/errors.js";
import { agent, bondAgents, makeAction, makeContext, makeWorld, sequence } from "./helpers.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("applyUpkeep", () => {
  it("burns one spark and ages every living mind", () => {
    const world = makeWorld([3, 1]);
    const ctx = makeContext(world);

    expect(applyUpkeep(ctx)).toBe(2);
    expect(agent(world, "agent_001").sparks).toBe(2);
    expect(agent(world, "agent_002").sparks).toBe(0);
    expect(agent(world, "agent_001").age).toBe(1);
    expect(ctx.report.sparksLost).toBe(2);
    expect(world.totals.totalSparksLost).toBe(2);
    expect(ctx.report.ledger.map((e) => [e.from, e.to, e.reason])).toEqual([
      ["agent_001", "upkeep", "upkeep"],
      ["agent_002", "upkeep", "upkeep"],
    ]);
  });

  it("skips vanished minds", () => {
    const world = makeWorld([3, 3]);
    agent(world, "agent_002").status = "vanished";

    expect(applyUpkeep(makeContext(world))).toBe(1);
    expect(agent(world, "agent_002").sparks).toBe(3);
  });
});

describe("mintAndDistribute", () => {
  it("mints one unit per member, each to a uniformly drawn member", () => {
    const world = makeWorld([1, 1, 1]);
    const bond = bondAgents(world, ["agent_001", "agent_002", "agent_003"]);
    const ctx = makeContext(world, sequence(0, 0.5, 0.99));

    expect(mintAndDistribute(ctx)).toBe(3);
    expect(agent(world, "agent_001").sparks).toBe(2);
    expect(agent(world, "agent_002").sparks).toBe(2);
    expect(agent(world, "agent_003").sparks).toBe(2);
    expect(bond.sparksGeneratedThisTick).toBe(3);
    expect(ctx.report.sparksMinted).toBe(3);
  });

  it("draws with replacement so one member may take every unit", () => {
    const world = makeWorld([1, 1, 1]);
    bondAgents(world, ["agent_001", "agent_002", "agent_003"]);
    const ctx = makeContext(world, sequence(0, 0, 0));

    mintAndDistribute(ctx);
    expect(agent(world, "agent_001").sparks).toBe(4);
    expect(agent(world, "agent_002").sparks).toBe(1);
    expect(agent(world, "agent_003").sparks).toBe(1);
  });

  it("mints nothing without bonds", () => {
    const ctx = makeContext(makeWorld([1, 1]));
    expect(mintAndDistribute(ctx)).toBe(0);
    expect(ctx.report.ledger).toEqual([]);
  });
});

describe("auditMinting", () => {
  it("accepts a correct distribution", () => {
    const world = makeWorld([1, 1]);
    bondAgents(world, ["agent_001", "agent_002"]);
    const ctx = makeContext(world, sequence(0, 0.5));
    mintAndDistribute(ctx);

    expect(auditMinting(ctx)).toBe(2);
  });

  it("ignores bonds formed during this tick", () => {
    const world = makeWorld([1, 1]);
    bondAgents(world, ["agent_001", "agent_002"], 1);

    expect(auditMinting(makeContext(world))).toBe(0);
  });

  it("rejects a bond that minted the wrong number of units", () => {
    const world = makeWorld([1, 1]);
    bondAgents(world, ["agent_001", "agent_002"]);
    const ctx = makeContext(world, sequence(0, 0.5));
    mintAndDistribute(ctx);
    ctx.report.ledger.pop();

    expect(() => auditMinting(ctx)).toThrow(InvariantViolationError);
  });

  it("rejects a payment to a non-member", () => {
    const world = makeWorld([1, 1, 1]);
    bondAgents(world, ["agent_001", "agent_002"]);
    const ctx = makeContext(world, sequence(0, 0.5));
    mintAndDistribute(ctx);
    ctx.report.ledger[1].to = "agent_003";

    expect(() => auditMinting(ctx)).toThrow("paid non-member agent_003");
  });
});

describe("applyGrants", () => {
  it("clamps to five and to the balance left when granting", () => {
    const world = makeWorld([1, 1]);
    world.benefactor.balance = 3;
    const ctx = makeContext(world);
    const requests = [
      makeAction("agent_001", "request-grant", null, 0),
      makeAction("agent_002", "request-grant", null, 0),
    ];

    const outcomes = applyGrants(ctx, requests, [
      { agentId: "agent_001", amountGranted: 10, reasoning: "generous" },
      { agentId: "agent_002", amountGranted: 4, reasoning: "also generous" },
    ]);

    expect(outcomes.map((o) => [o.agentId, o.amountGranted, o.balanceBefore, o.balanceAfter])).toEqual([
      ["agent_001", 3, 3, 0],
      ["agent_002", 0, 0, 0],
    ]);
    expect(agent(world, "agent_001").sparks).toBe(4);
    expect(agent(world, "agent_002").sparks).toBe(1);
    expect(world.benefactor.balance).toBe(0);
    expect(ctx.report.grants).toEqual(outcomes);
  });

  it("settles unanswered requests with zero and refuses answers nobody asked for", () => {
    const world = makeWorld([1, 1]);
    const ctx = makeContext(world);

    const outcomes = applyGrants(
      ctx,
      [makeAction("agent_001", "request-grant", null, 0)],
      [{ agentId: "agent_002", amountGranted: 2, reasoning: "unprompted" }]
    );

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]).toMatchObject({
      agentId: "agent_001",
      amountGranted: 0,
      reasoning: "The benefactor did not answer",
    });
    expect(agent(world, "agent_002").sparks).toBe(1);
    expect(world.benefactor.balance).toBe(2);
    expect(ctx.report.grantRefusals).toEqual([
      { tick: 1, agentId: "agent_002", amountOffered: 2, reasoning: "unprompted" },
    ]);
  });

  it("treats negative and non-finite amounts as zero", () => {
    const world = makeWorld([1, 1]);
    const ctx = makeContext(world);

    const outcomes = applyGrants(
      ctx,
      [makeAction("agent_001", "request-grant", null, 0), makeAction("agent_002", "request-grant", null, 0)],
      [
        { agentId: "agent_001", amountGranted: -3, reasoning: "" },
        { agentId: "agent_002", amountGranted: Number.NaN, reasoning: "" },
      ]
    );

    expect(outcomes.map((o) => o.amountGranted)).toEqual([0, 0]);
    expect(world.benefactor.balance).toBe(2);
  });

  it("pays nothing to a requester that vanished", () => {
    const world = makeWorld([1, 1]);
    agent(world, "agent_001").status = "vanished";
    const ctx = makeContext(world);

    const [outcome] = applyGrants(
      ctx,
      [makeAction("agent_001", "request-grant", null, 0)],
      [{ agentId: "agent_001", amountGranted: 2, reasoning: "too late" }]
    );

    expect(outcome.amountGranted).toBe(0);
    expect(agent(world, "agent_001").sparks).toBe(1);
  });

  it("answers each requester once and tells it the result", () => {
    const world = makeWorld([1, 1]);
    const ctx = makeContext(world);

    applyGrants(
      ctx,
      [makeAction("agent_001", "request-grant", null, 0), makeAction("agent_001", "request-grant", null, 0)],
      [
        { agentId: "agent_001", amountGranted: 1, reasoning: "first" },
        { agentId: "agent_001", amountGranted: 1, reasoning: "second" },
      ]
    );

    expect(agent(world, "agent_001").sparks).toBe(2);
    expect(ctx.report.grantRefusals).toEqual([
      { tick: 1, agentId: "agent_001", amountOffered: 1, reasoning: "second" },
    ]);
    expect(world.visibility.current.events).toEqual([
      {
        tick: 1,
        agentId: "agent_001",
        type: "grant_received",
        description: "The benefactor granted you 1 sparks",
        sparkChange: 1,
        sourceAgentId: null,
      },
    ]);
  });
});

describe("regenerateBenefactor", () => {
  it("adds the regeneration amount every tick", () => {
    const world = makeWorld([1, 1, 1, 1]);
    const ctx = makeContext(world);

    expect(regenerateBenefactor(ctx)).toBe(2);
    expect(world.benefactor.balance).toBe(6);
    expect(ctx.report.ledger[0]).toMatchObject({ from: "regen", to: "benefactor", amount: 2 });
  });
});
