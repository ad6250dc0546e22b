import {
  MAX_GRANT_PER_REQUEST,
  UPKEEP_PER_TICK,
  type GrantDecision,
  type GrantOutcome,
  type PendingAction,
} from "@spark-world/shared";
import { InvariantViolationError } from "../lib/errors.js";
import { pickOne } from "../lib/random.js";
import type { TickContext } from "./tick-context.js";
import { recordEvent, recordLedger } from "./tick-context.js";
import { aliveAgents, findAgent, findBond, liveBonds } from "./world-state.js";

// === Upkeep (cost of existence) ===

/** Every living mind pays one spark and ages one tick. Returns sparks burned. */
export function applyUpkeep(ctx: TickContext): number {
  let burned = 0;

  for (const agent of aliveAgents(ctx.world)) {
    agent.sparks -= UPKEEP_PER_TICK;
    agent.age += 1;
    burned += UPKEEP_PER_TICK;

    recordLedger(ctx, {
      from: agent.id,
      to: "upkeep",
      amount: UPKEEP_PER_TICK,
      reason: "upkeep",
      note: "Cost of existence",
    });
  }

  ctx.report.sparksLost += burned;
  ctx.world.totals.totalSparksLost += burned;
  return burned;
}

// === Bond minting ===

/**
 * Each live bond mints one spark per member. Every unit lands on a member
 * drawn uniformly with replacement, so a member may get several or none.
 */
export function mintAndDistribute(ctx: TickContext): number {
  let minted = 0;

  for (const bond of liveBonds(ctx.world)) {
    const units = bond.members.length;
    bond.sparksGeneratedThisTick = units;

    for (let i = 0; i < units; i++) {
      const recipientId = pickOne(ctx.random, bond.members);
      const recipient = findAgent(ctx.world, recipientId);
      if (!recipient) {
        throw new InvariantViolationError(
          `bond ${bond.id} lists unknown member ${recipientId}`
        );
      }
      recipient.sparks += 1;
      minted += 1;

      recordLedger(ctx, {
        from: bond.id,
        to: recipientId,
        amount: 1,
        reason: "bond_mint",
        note: `Unit ${i + 1} of ${units} minted by bond ${bond.id}`,
      });
    }
  }

  ctx.report.sparksMinted += minted;
  ctx.world.totals.totalSparksMinted += minted;
  return minted;
}

/** Stage 4 audit: every bond distributed exactly one unit per member, all to members. */
export function auditMinting(ctx: TickContext): number {
  const received = new Map<string, number>();
  for (const entry of ctx.report.ledger) {
    if (entry.reason !== "bond_mint") continue;
    received.set(entry.from, (received.get(entry.from) ?? 0) + entry.amount);
  }

  let audited = 0;
  for (const bond of liveBonds(ctx.world)) {
    if (bond.createdTick === ctx.tick) continue; // formed after minting
    const units = received.get(bond.id) ?? 0;
    if (units !== bond.members.length || bond.sparksGeneratedThisTick !== units) {
      throw new InvariantViolationError(
        `bond ${bond.id} minted ${units} sparks for ${bond.members.length} members`
      );
    }
    audited += units;
  }

  for (const entry of ctx.report.ledger) {
    if (entry.reason !== "bond_mint") continue;
    const bond = findBond(ctx.world, entry.from);
    if (bond && !bond.members.includes(entry.to)) {
      throw new InvariantViolationError(
        `bond ${entry.from} paid non-member ${entry.to}`
      );
    }
  }
  return audited;
}

// === Benefactor grants ===

function clampGrant(amount: number): number {
  if (!Number.isFinite(amount)) return 0;
  return Math.min(MAX_GRANT_PER_REQUEST, Math.max(0, Math.floor(amount)));
}

/**
 * Apply the benefactor's answers to last tick's requests. Amounts are
 * clamped to [0, 5] and to the balance left at the moment of granting;
 * answers for agents with no open request are refused and unanswered
 * requests get nothing.
 */
export function applyGrants(
  ctx: TickContext,
  requests: PendingAction[],
  decisions: GrantDecision[]
): GrantOutcome[] {
  const { world } = ctx;
  const open = new Map<string, PendingAction>();
  for (const request of requests) {
    if (!open.has(request.agentId)) open.set(request.agentId, request);
  }

  const outcomes: GrantOutcome[] = [];
  const settle = (request: PendingAction, granted: number, reasoning: string) => {
    const before = world.benefactor.balance;
    world.benefactor.balance = before - granted;
    outcomes.push({
      tick: ctx.tick,
      agentId: request.agentId,
      requestContent: request.content,
      amountGranted: granted,
      balanceBefore: before,
      balanceAfter: world.benefactor.balance,
      reasoning,
    });
    recordEvent(ctx, {
      agentId: request.agentId,
      type: "grant_received",
      description: `The benefactor granted you ${granted} sparks`,
      sparkChange: granted,
      sourceAgentId: null,
    });
    open.delete(request.agentId);
  };

  for (const decision of decisions) {
    const request = open.get(decision.agentId);
    if (!request) {
      console.warn(
        `[LEDGER] Refusing grant for ${decision.agentId}: no open request`
      );
      ctx.report.grantRefusals.push({
        tick: ctx.tick,
        agentId: decision.agentId,
        amountOffered: decision.amountGranted,
        reasoning: decision.reasoning,
      });
      continue;
    }

    const agent = findAgent(world, request.agentId);
    if (!agent || agent.status !== "alive") {
      settle(request, 0, "The requester vanished before the grant arrived");
      continue;
    }

    const granted = Math.min(clampGrant(decision.amountGranted), world.benefactor.balance);
    if (granted > 0) {
      agent.sparks += granted;
      recordLedger(ctx, {
        from: "benefactor",
        to: agent.id,
        amount: granted,
        reason: "benefactor_grant",
        note: decision.reasoning,
      });
    }
    settle(request, granted, decision.reasoning);
  }

  for (const request of [...open.values()]) {
    settle(request, 0, "The benefactor did not answer");
  }

  ctx.report.grants.push(...outcomes);
  return outcomes;
}

/** The benefactor's reserves grow every tick, requests or not. */
export function regenerateBenefactor(ctx: TickContext): number {
  const amount = ctx.world.benefactor.regenPerTick;
  ctx.world.benefactor.balance += amount;
  recordLedger(ctx, {
    from: "regen",
    to: "benefactor",
    amount,
    reason: "benefactor_regen",
    note: "Benefactor reserves regenerate",
  });
  return amount;
}
