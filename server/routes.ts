import express, { type Express } from "express";
import { registerSimulationRoutes } from "./routes/simulation.routes";
import type { SimulationRegistry } from "./simulation";

export function createApp(registry: SimulationRegistry): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  registerRoutes(app, registry);
  return app;
}

export function registerRoutes(app: Express, registry: SimulationRegistry): void {
  registerSimulationRoutes(app, registry);

  app.use("/api", (_req, res) => {
    res.status(404).json({ message: "Not found", code: "NOT_FOUND" });
  });
}
