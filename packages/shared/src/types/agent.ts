export type AgentStatus = "alive" | "vanished";

export type BondStatus = "unbonded" | "bonded" | "leader";

/** Persona fields produced by the character generator. */
export interface Persona {
  name: string;
  species: string;
  homeRealm: string;
  personality: string[];
  quirk: string;
  ability: string;
  backstory: string;
  openingGoal: string;
  speechStyle: string;
}

export interface Agent extends Persona {
  id: string;
  parentId: string | null;
  sparks: number;
  age: number;
  status: AgentStatus;
  bondStatus: BondStatus;
  /** Sorted ids of the other members of this agent's bond. */
  bondMates: string[];
  bornTick: number;
  vanishedTick: number | null;
}

/** What every mind may know about every other mind. */
export interface PublicAgentInfo {
  id: string;
  name: string;
  species: string;
  homeRealm: string;
  sparks: number;
  age: number;
  status: AgentStatus;
  bondStatus: BondStatus;
}
