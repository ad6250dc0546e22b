import express from "express";
import cors from "cors";
import { env, corsOrigins } from "./config/env.js";
import { createDatabase } from "./config/database.js";
import { errorHandler } from "./middleware/error-handler.js";
import { apiKeyAuth } from "./middleware/auth.js";
import { sseManager } from "./lib/sse-manager.js";
import { simulationRoutes } from "./routes/simulations.js";
import sseRoutes from "./routes/sse.js";
import { ClaudeOracles } from "./services/claude-client.js";
import { DrizzleSimulationStore } from "./services/drizzle-simulation-store.js";
import { HeuristicOracles } from "./services/heuristic-oracles.js";
import { SseNarrativeReporter } from "./services/narrative-reporter.js";
import type { Oracles } from "./services/oracles.js";
import { SimulationEngine } from "./services/simulation-engine.js";
import { MemorySimulationStore, type SimulationStore } from "./services/simulation-store.js";
import { startTickScheduler } from "./services/tick-scheduler.js";

const store: SimulationStore = env.DATABASE_URL
  ? new DrizzleSimulationStore(createDatabase(env.DATABASE_URL))
  : new MemorySimulationStore();

function createOracles(): Oracles {
  if (env.ANTHROPIC_API_KEY) {
    const claude = new ClaudeOracles({
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
    });
    return { decisions: claude, benefactor: claude, characters: claude, missions: claude };
  }
  const heuristic = new HeuristicOracles();
  return { decisions: heuristic, benefactor: heuristic, characters: heuristic, missions: heuristic };
}

const engine = new SimulationEngine({
  store,
  oracles: createOracles(),
  reporter: new SseNarrativeReporter(sseManager),
  oracleTimeoutMs: env.ORACLE_TIMEOUT_MS,
});

const app = express();

// Middleware
app.use(
  cors({
    origin: corsOrigins,
    credentials: true,
  })
);
app.use(express.json());
app.use(apiKeyAuth(env.API_KEY));

// Health check
app.get("/api/health", (_req, res) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Routes
app.use("/api/simulations", simulationRoutes(engine, store));
app.use("/api", sseRoutes);

// Error handler
app.use(errorHandler);

// Start server
app.listen(env.PORT, () => {
  console.log(`[SERVER] Spark World API running on port ${env.PORT}`);
  console.log(`[SERVER] Environment: ${env.NODE_ENV}`);
  console.log(`[SERVER] Store: ${env.DATABASE_URL ? "postgres" : "memory"}`);
  console.log(`[SERVER] Oracles: ${env.ANTHROPIC_API_KEY ? `claude (${env.ANTHROPIC_MODEL})` : "heuristic"}`);

  if (env.TICK_CRON) {
    startTickScheduler(env.TICK_CRON, engine, store);
  }
});
