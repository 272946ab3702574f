import type { Express, Response } from "express";
import { z } from "zod";
import { fromError } from "zod-validation-error";
import { SimulationError, type SimulationErrorCode } from "../errors";
import type { SimulationRegistry } from "../simulation";

const createSimulationSchema = z.object({
  context: z.string(),
  numPersonas: z.number().optional(),
  maxTurns: z.number().optional(),
});

const reflectPersonasSchema = z.object({
  context: z.string(),
  numPersonas: z.number().optional(),
});

const STATUS_BY_CODE: Record<SimulationErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  GENERATION_ERROR: 422,
  GATEWAY_ERROR: 502,
};

function sendError(res: Response, error: unknown, action: string) {
  if (error instanceof SimulationError) {
    return res.status(STATUS_BY_CODE[error.code]).json({ message: error.message, code: error.code });
  }
  console.error(`[Server] Error ${action}:`, error);
  return res.status(500).json({ message: `Failed to ${action}`, code: "INTERNAL" });
}

export function registerSimulationRoutes(app: Express, registry: SimulationRegistry) {
  app.get("/api/simulations", (_req, res) => {
    res.json(registry.listSimulations());
  });

  app.post("/api/simulations", (req, res) => {
    try {
      const parseResult = createSimulationSchema.safeParse(req.body);
      if (!parseResult.success) {
        const errorMessage = fromError(parseResult.error).toString();
        return res.status(400).json({ message: errorMessage, code: "INVALID_ARGUMENT" });
      }
      const { context, numPersonas, maxTurns } = parseResult.data;
      const simulationId = registry.createSimulation(context, numPersonas, maxTurns);
      res.status(201).json({ simulationId });
    } catch (error) {
      sendError(res, error, "create simulation");
    }
  });

  app.get("/api/simulations/:id", (req, res) => {
    try {
      res.json(registry.getSimulation(req.params.id));
    } catch (error) {
      sendError(res, error, "fetch simulation");
    }
  });

  app.delete("/api/simulations/:id", async (req, res) => {
    try {
      await registry.deleteSimulation(req.params.id);
      res.json({ deleted: true });
    } catch (error) {
      sendError(res, error, "delete simulation");
    }
  });

  app.post("/api/simulations/:id/prepare", async (req, res) => {
    try {
      await registry.prepareSimulation(req.params.id);
      res.status(202).json(registry.getSimulation(req.params.id));
    } catch (error) {
      sendError(res, error, "prepare simulation");
    }
  });

  app.post("/api/simulations/:id/start", async (req, res) => {
    try {
      await registry.startSimulation(req.params.id);
      res.status(202).json(registry.getSimulation(req.params.id));
    } catch (error) {
      sendError(res, error, "start simulation");
    }
  });

  app.post("/api/simulations/:id/stop", async (req, res) => {
    try {
      await registry.stopSimulation(req.params.id);
      res.json(registry.getSimulation(req.params.id));
    } catch (error) {
      sendError(res, error, "stop simulation");
    }
  });

  app.get("/api/simulations/:id/personas", (req, res) => {
    try {
      res.json(registry.getPersonas(req.params.id));
    } catch (error) {
      sendError(res, error, "fetch personas");
    }
  });

  app.get("/api/simulations/:id/conversations", (req, res) => {
    try {
      res.json(registry.getConversations(req.params.id));
    } catch (error) {
      sendError(res, error, "fetch conversations");
    }
  });

  app.get("/api/simulations/:id/insights", (req, res) => {
    try {
      res.json(registry.getInsights(req.params.id));
    } catch (error) {
      sendError(res, error, "fetch insights");
    }
  });

  app.post("/api/simulations/:id/insights/refresh", async (req, res) => {
    try {
      res.json(await registry.refreshInsights(req.params.id));
    } catch (error) {
      sendError(res, error, "refresh insights");
    }
  });

  app.get("/api/simulations/:id/progress", (req, res) => {
    try {
      res.json(registry.getProgress(req.params.id));
    } catch (error) {
      sendError(res, error, "fetch progress");
    }
  });

  app.post("/api/personas/reflect", async (req, res) => {
    try {
      const parseResult = reflectPersonasSchema.safeParse(req.body);
      if (!parseResult.success) {
        const errorMessage = fromError(parseResult.error).toString();
        return res.status(400).json({ message: errorMessage, code: "INVALID_ARGUMENT" });
      }
      const { context, numPersonas } = parseResult.data;
      const personas = await registry.reflectPersonas(context, numPersonas);
      res.json({ personas });
    } catch (error) {
      sendError(res, error, "reflect personas");
    }
  });
}
