export type SimulationStatus = "running" | "extinct";

export interface SimulationSummary {
  id: string;
  name: string;
  tick: number;
  status: SimulationStatus;
  createdAt: string;
}

export interface SimulationStats {
  tick: number;
  totalAgents: number;
  aliveAgents: number;
  vanishedAgents: number;
  activeBonds: number;
  activeMissions: number;
  completedMissions: number;
  totalSparks: number;
  benefactorBalance: number;
  agentsByBondStatus: Record<string, number>;
  totalSparksMinted: number;
  totalSparksLost: number;
  totalRaidsAttempted: number;
  totalBondsFormed: number;
}

export interface ApiError {
  error: string;
  message: string;
  statusCode: number;
}
