import {
  RAID_MAX_STEAL,
  RAID_MIN_STEAL,
  RAID_STAKE,
  type Agent,
  type PendingAction,
  type RaidResult,
} from "@spark-world/shared";
import { randomInt } from "../lib/random.js";
import type { TickContext } from "./tick-context.js";
import { checkTarget, dropAction, recordEvent, recordLedger } from "./tick-context.js";
import { requireAgent } from "./world-state.js";

export function raidStrength(agent: Agent): number {
  return agent.age + agent.sparks;
}

export function raidSuccessProbability(
  attackerStrength: number,
  defenderStrength: number
): number {
  const total = attackerStrength + defenderStrength;
  return total > 0 ? attackerStrength / total : 0.5;
}

/**
 * Resolve one raid as a weighted coin flip. Strengths are read now, after
 * this tick's upkeep, minting and grants. Returns null when the action was
 * invalid and dropped.
 */
export function resolveRaid(
  ctx: TickContext,
  action: PendingAction
): RaidResult | null {
  const problem = checkTarget(ctx.world, action);
  if (problem || !action.targetId) {
    dropAction(ctx, action, problem ?? "missing_target");
    return null;
  }

  const attacker = requireAgent(ctx.world, action.agentId);
  const defender = requireAgent(ctx.world, action.targetId);
  const attackerStrength = raidStrength(attacker);
  const defenderStrength = raidStrength(defender);

  ctx.world.totals.totalRaidsAttempted += 1;

  let result: RaidResult;
  if (attacker.sparks < RAID_STAKE) {
    result = {
      tick: ctx.tick,
      attackerId: attacker.id,
      defenderId: defender.id,
      outcome: "insufficient_stake",
      attackerStrength,
      defenderStrength,
      successProbability: 0,
      sparksTransferred: 0,
    };
    console.log(`[RAID] ${attacker.id} has no spark to stake against ${defender.id}`);
  } else {
    const successProbability = raidSuccessProbability(attackerStrength, defenderStrength);
    const won = ctx.random() < successProbability;

    let transferred: number;
    if (won) {
      transferred = Math.min(
        randomInt(ctx.random, RAID_MIN_STEAL, RAID_MAX_STEAL),
        defender.sparks
      );
      defender.sparks -= transferred;
      attacker.sparks += transferred;
      if (transferred > 0) {
        recordLedger(ctx, {
          from: defender.id,
          to: attacker.id,
          amount: transferred,
          reason: "raid_success",
          note: `Raid won ${attackerStrength} vs ${defenderStrength}`,
        });
      }
    } else {
      attacker.sparks -= RAID_STAKE;
      defender.sparks += RAID_STAKE;
      transferred = -RAID_STAKE;
      recordLedger(ctx, {
        from: attacker.id,
        to: defender.id,
        amount: RAID_STAKE,
        reason: "raid_failure",
        note: `Raid lost ${attackerStrength} vs ${defenderStrength}`,
      });
    }

    result = {
      tick: ctx.tick,
      attackerId: attacker.id,
      defenderId: defender.id,
      outcome: won ? "won" : "lost",
      attackerStrength,
      defenderStrength,
      successProbability,
      sparksTransferred: transferred,
    };
    console.log(
      `[RAID] ${attacker.id} -> ${defender.id}: ${result.outcome} (p=${successProbability.toFixed(3)}, ${transferred >= 0 ? "+" : ""}${transferred})`
    );
  }

  recordEvent(ctx, {
    agentId: attacker.id,
    type: "raid_attack",
    description: `You raided ${defender.id}: ${result.outcome}`,
    sparkChange: result.sparksTransferred,
    sourceAgentId: defender.id,
  });
  recordEvent(ctx, {
    agentId: defender.id,
    type: "raid_defense",
    description: `${attacker.id} raided you: ${result.outcome === "won" ? "you were robbed" : "you held"}`,
    sparkChange: -result.sparksTransferred,
    sourceAgentId: attacker.id,
  });

  ctx.report.raids.push(result);
  return result;
}
