import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/error-handler.js";
import type { TickReport } from "@spark-world/shared";
import { TickInProgressError, errorMessage } from "../lib/errors.js";
import { sseManager, type SSEManager } from "../lib/sse-manager.js";
import { MAX_AGENTS, type SimulationEngine } from "../services/simulation-engine.js";
import type { SimulationStore } from "../services/simulation-store.js";

const createSimulationSchema = z.object({
  numAgents: z.coerce.number().int().min(1).max(MAX_AGENTS),
  name: z.string().trim().min(1).max(100).default("Spark World"),
});

const tickParamSchema = z.coerce.number().int().nonnegative();

/**
 * Run one tick and tell live clients when it fails. A tick refused because
 * another one is running is not a failure: that tick still completes.
 */
export async function tickAndNotify(
  engine: Pick<SimulationEngine, "tick">,
  simulationId: string,
  sse: SSEManager = sseManager
): Promise<TickReport> {
  try {
    return await engine.tick(simulationId);
  } catch (error) {
    if (!(error instanceof TickInProgressError)) {
      sse.broadcast({
        type: "tick_failed",
        simulationId,
        data: { message: errorMessage(error) },
      });
    }
    throw error;
  }
}

export function simulationRoutes(engine: SimulationEngine, store: SimulationStore): Router {
  const router = Router();

  // Create a simulation and run genesis
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const { numAgents, name } = createSimulationSchema.parse(req.body);
      const simulationId = await engine.initialize(numAgents, name);

      sseManager.broadcast({
        type: "simulation_created",
        simulationId,
        data: { name, numAgents },
      });
      res.status(201).json({ simulationId });
    })
  );

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const simulations = await store.listSimulations();
      res.json({ data: simulations, total: simulations.length });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      res.json(await engine.getWorld(req.params.id));
    })
  );

  // Advance one tick
  router.post(
    "/:id/tick",
    asyncHandler(async (req, res) => {
      res.json(await tickAndNotify(engine, req.params.id));
    })
  );

  router.get(
    "/:id/ticks/:tick",
    asyncHandler(async (req, res) => {
      const tick = tickParamSchema.parse(req.params.tick);
      const report = await store.getReport(req.params.id, tick);
      if (!report) {
        res.status(404).json({
          error: "NotFound",
          message: `No report for tick ${tick}`,
          statusCode: 404,
        });
        return;
      }
      res.json(report);
    })
  );

  router.get(
    "/:id/agents/:agentId/observation",
    asyncHandler(async (req, res) => {
      res.json(await engine.previewObservation(req.params.id, req.params.agentId));
    })
  );

  router.get(
    "/:id/stats",
    asyncHandler(async (req, res) => {
      res.json(await engine.stats(req.params.id));
    })
  );

  return router;
}
