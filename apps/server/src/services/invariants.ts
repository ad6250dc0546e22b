import { MIN_BOND_SIZE, type WorldState } from "@spark-world/shared";
import { InvariantViolationError } from "../lib/errors.js";
import { findAgent, findBond } from "./world-state.js";

function fail(message: string): never {
  throw new InvariantViolationError(message);
}

/** Structural checks run before a tick is allowed to be saved. */
export function assertWorldInvariants(world: WorldState): void {
  const membership = new Map<string, string>();

  for (const bond of Object.values(world.bonds)) {
    if (bond.members.length < MIN_BOND_SIZE) {
      fail(`bond ${bond.id} has ${bond.members.length} members`);
    }
    if (!bond.members.includes(bond.leaderId)) {
      fail(`bond ${bond.id} leader ${bond.leaderId} is not a member`);
    }

    for (const memberId of bond.members) {
      const member = findAgent(world, memberId);
      if (!member) fail(`bond ${bond.id} lists unknown agent ${memberId}`);
      if (member.status !== "alive") {
        fail(`bond ${bond.id} still holds vanished agent ${memberId}`);
      }

      const previous = membership.get(memberId);
      if (previous) fail(`agent ${memberId} is in both ${previous} and ${bond.id}`);
      membership.set(memberId, bond.id);

      const expectedStatus = memberId === bond.leaderId ? "leader" : "bonded";
      if (member.bondStatus !== expectedStatus) {
        fail(`agent ${memberId} has status ${member.bondStatus} in bond ${bond.id}`);
      }
      const expectedMates = bond.members.filter((id) => id !== memberId);
      if (
        member.bondMates.length !== expectedMates.length ||
        expectedMates.some((id) => !member.bondMates.includes(id))
      ) {
        fail(`agent ${memberId} bond-mates disagree with bond ${bond.id}`);
      }
    }
  }

  for (const agent of Object.values(world.agents)) {
    if (!membership.has(agent.id)) {
      if (agent.bondStatus !== "unbonded" || agent.bondMates.length > 0) {
        fail(`agent ${agent.id} claims a bond that does not exist`);
      }
    }
    if (agent.status === "alive" && agent.sparks < 0) {
      fail(`alive agent ${agent.id} holds ${agent.sparks} sparks`);
    }
  }

  const openMissions = new Set<string>();
  for (const mission of Object.values(world.missions)) {
    if (mission.isComplete) continue;
    if (!findBond(world, mission.bondId)) {
      fail(`mission ${mission.id} is open but bond ${mission.bondId} is gone`);
    }
    if (openMissions.has(mission.bondId)) {
      fail(`bond ${mission.bondId} has more than one open mission`);
    }
    openMissions.add(mission.bondId);
  }

  if (world.benefactor.balance < 0) {
    fail(`benefactor balance is ${world.benefactor.balance}`);
  }
  if (world.visibility.current.tick !== world.tick) {
    fail(
      `current buffer belongs to tick ${world.visibility.current.tick}, world is at ${world.tick}`
    );
  }
}
