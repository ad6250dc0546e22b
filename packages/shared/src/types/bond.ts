export interface Bond {
  id: string;
  /** Sorted member ids, at least two. */
  members: string[];
  leaderId: string;
  missionId: string | null;
  sparksGeneratedThisTick: number;
  createdTick: number;
}

export type MissionCompletionReason = "goal_met" | "bond_dissolved";

export interface Mission {
  id: string;
  bondId: string;
  title: string;
  description: string;
  goal: string;
  leaderId: string;
  currentProgress: string;
  /** agentId -> task description */
  assignedTasks: Record<string, string>;
  isComplete: boolean;
  createdTick: number;
  completedTick: number | null;
  completionReason: MissionCompletionReason | null;
}

export interface MissionContent {
  title: string;
  description: string;
  goal: string;
}
