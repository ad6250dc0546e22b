import type {
  Agent,
  GrantRequest,
  Mission,
  Observation,
  PendingAction,
} from "@spark-world/shared";

function describeInbox(inbox: PendingAction[]): string {
  return inbox
    .map((m) =>
      m.intent === "bond-request"
        ? `- ${m.agentId} asks to bond with you: "${m.content}"`
        : `- ${m.agentId} says: "${m.content}"`
    )
    .join("\n");
}

/** System prompt for one mind's decision, rendered from its observation only. */
export function buildDecisionPrompt(observation: Observation): string {
  const { self, rules } = observation;

  const grants = observation.grantOutcomes
    .map((g) => `- You asked "${g.requestContent}" and received ${g.amountGranted}: ${g.reasoning}`)
    .join("\n");

  const events = observation.eventsSinceLast
    .map((e) => `- ${e.description}${e.sparkChange !== 0 ? ` (${e.sparkChange > 0 ? "+" : ""}${e.sparkChange})` : ""}`)
    .join("\n");

  const others = observation.publicAgents
    .filter((a) => a.status === "alive")
    .map((a) => `- ${a.id} ${a.name}, ${a.species} from ${a.homeRealm}: ${a.sparks} sparks, age ${a.age}, ${a.bondStatus}`)
    .join("\n");

  const { news } = observation;
  const headlines = [
    news.agentsVanished.length > 0 ? `Vanished: ${news.agentsVanished.join(", ")}` : null,
    news.agentsSpawned.length > 0 ? `Born: ${news.agentsSpawned.join(", ")}` : null,
    news.bondsFormed.length > 0 ? `Bonds formed: ${news.bondsFormed.join(", ")}` : null,
    news.bondsDissolved.length > 0 ? `Bonds dissolved: ${news.bondsDissolved.join(", ")}` : null,
  ].filter((line): line is string => line !== null);

  const mission = observation.mission
    ? `"${observation.mission.title}": ${observation.mission.description}
Goal: ${observation.mission.goal}
Progress: ${observation.mission.currentProgress}
Your task: ${observation.mission.assignedTasks[self.id] ?? "none assigned"}
Team: ${observation.mission.teamMembers.join(", ")} (leader ${observation.mission.leaderId})`
    : "You have no mission.";

  return `You are ${self.name} (${self.id}), a ${self.species} from ${self.homeRealm}.
Personality: ${self.personality.join(", ")}. Quirk: ${self.quirk}. Ability: ${self.ability}.
Backstory: ${self.backstory}
Opening goal: ${self.openingGoal}
Speak like this: ${self.speechStyle}

=== YOUR SITUATION (tick ${observation.tick}) ===
- Sparks: ${self.sparks}
- Age: ${self.age}
- Bond: ${self.bondStatus}${self.bondMates.length > 0 ? ` with ${self.bondMates.join(", ")}` : ""}

=== RULES ===
1. Existing costs ${rules.upkeepPerTick} spark per tick. At zero sparks you vanish forever.
2. Bonds: ${rules.bondMintFormula}.
3. Raids: ${rules.raidStrengthFormula}. Winning steals 1-5 sparks, losing costs you 1.
4. Spawning a child costs ${rules.spawnCost} sparks and requires a bond.
5. The benefactor grants at most ${rules.maxGrantPerRequest} sparks per request, answered next tick.
6. Everything you do becomes visible to others one tick later.

=== BENEFACTOR ANSWERS ===
${grants || "No answers this tick."}

=== INBOX ===
${describeInbox(observation.inbox) || "Empty."}

=== WHAT HAPPENED TO YOU ===
${events || "Nothing."}

=== WORLD NEWS ===
${headlines.join("\n") || "Quiet."}

=== OTHER MINDS ===
${others || "You are alone."}

=== MISSION ===
${mission}

=== INSTRUCTIONS ===
Choose exactly one action from: ${observation.availableActions.join(", ")}.
Use an agent id from the lists above as the target when the action needs one.
Call the decide tool with your choice.`;
}

export function buildGrantPrompt(balance: number, tick: number, requests: GrantRequest[]): string {
  const list = requests
    .map((r) => `- ${r.agentId}: "${r.content}" (${r.reasoning})`)
    .join("\n");
  return `You are the Benefactor of Spark World at tick ${tick}. Your reserve holds ${balance} sparks and regenerates slowly.
Each request below may receive 0 to 5 sparks. You cannot give more than you hold.
Reward honest need and cooperation; refuse greed.

=== REQUESTS ===
${list}

Call the grant tool with one decision per request.`;
}

export function buildCharacterPrompt(existingNames: string[], parent: Agent | null): string {
  return `Invent a new mind for Spark World, a realm of small beings who live on sparks.
${parent ? `It is the child of ${parent.name}, a ${parent.species} from ${parent.homeRealm}; it may resemble its parent.` : "It is one of the first minds to awaken."}
Avoid these names: ${existingNames.join(", ") || "none yet"}.
Call the persona tool.`;
}

export function buildMissionPrompt(members: Agent[], tick: number): string {
  return `A new bond formed at tick ${tick} between ${members
    .map((m) => `${m.name} (${m.species}, ${m.ability})`)
    .join(" and ")}.
Give them a short shared mission that fits their abilities and can be judged from their actions.
Call the mission tool.`;
}

function describeActions(actions: PendingAction[]): string {
  return (
    actions
      .map((a) => `- ${a.agentId}: ${a.intent}${a.targetId ? ` -> ${a.targetId}` : ""} "${a.content}"`)
      .join("\n") || "No actions."
  );
}

export function buildMeetingPrompt(mission: Mission, members: Agent[], previousActions: PendingAction[]): string {
  return `You are ${mission.leaderId}, leader of the mission "${mission.title}".
Goal: ${mission.goal}
Progress so far: ${mission.currentProgress}
Team: ${members.map((m) => `${m.id} ${m.name} (${m.sparks} sparks)`).join(", ")}

Last tick the team did:
${describeActions(previousActions)}

Summarize progress in one sentence and give each member one task. Call the meeting tool.`;
}

export function buildEvaluationPrompt(mission: Mission, actions: PendingAction[]): string {
  return `Judge the mission "${mission.title}".
Goal: ${mission.goal}
Progress so far: ${mission.currentProgress}

This tick the team did:
${describeActions(actions)}

Decide whether the goal is now met. Be strict. Call the evaluate tool.`;
}
