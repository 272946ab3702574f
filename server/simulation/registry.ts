import type {
  Conversation,
  Insight,
  Persona,
  PersonaOutline,
  SimulationProgress,
  SimulationSnapshot,
  SimulationStatus,
} from "@shared/types/simulation";
import { DEFAULT_SIMULATION_CONFIG } from "@shared/types/simulation";
import { InvalidArgumentError, NotFoundError } from "../errors";
import type { UsageLedger } from "../llm-usage";
import type { ModelGateway } from "../model-gateway";
import { reflectPersonas } from "../persona-generation";
import { SimulationController } from "./controller";
import { SIMULATION_LIMITS, type SimulationRuntimeConfig } from "./types";

export interface SimulationRegistryOptions {
  gateway: ModelGateway;
  ledger?: UsageLedger;
  config: SimulationRuntimeConfig;
}

function validateContext(context: unknown): string {
  if (typeof context !== "string" || context.trim().length === 0) {
    throw new InvalidArgumentError("context must be a non-empty string");
  }
  const trimmed = context.trim();
  if (trimmed.length > SIMULATION_LIMITS.MAX_CONTEXT_LENGTH) {
    throw new InvalidArgumentError(`context must be at most ${SIMULATION_LIMITS.MAX_CONTEXT_LENGTH} characters`);
  }
  return trimmed;
}

function validateBound(name: string, value: unknown, max: number): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > max) {
    throw new InvalidArgumentError(`${name} must be an integer between 1 and ${max}`);
  }
  return value;
}

/**
 * Process-wide id to controller map. The map itself is only read or written
 * synchronously; each controller serializes its own lifecycle.
 */
export class SimulationRegistry {
  private readonly controllers = new Map<string, SimulationController>();
  private readonly options: SimulationRegistryOptions;

  constructor(options: SimulationRegistryOptions) {
    this.options = options;
  }

  createSimulation(
    context: string,
    numPersonas: number = DEFAULT_SIMULATION_CONFIG.numPersonas,
    maxTurns: number = DEFAULT_SIMULATION_CONFIG.maxTurns,
  ): string {
    const controller = new SimulationController({
      context: validateContext(context),
      numPersonas: validateBound("numPersonas", numPersonas, SIMULATION_LIMITS.MAX_PERSONAS),
      maxTurns: validateBound("maxTurns", maxTurns, SIMULATION_LIMITS.MAX_TURNS),
      gateway: this.options.gateway,
      ledger: this.options.ledger,
      config: this.options.config,
    });
    this.controllers.set(controller.id, controller);
    console.log(`[Simulation] Created | id=${controller.id} | personas=${numPersonas} | maxTurns=${maxTurns}`);
    return controller.id;
  }

  async prepareSimulation(id: string): Promise<void> {
    await this.require(id).prepare();
  }

  async startSimulation(id: string): Promise<void> {
    await this.require(id).start();
  }

  async stopSimulation(id: string): Promise<void> {
    await this.require(id).stop();
  }

  getSimulation(id: string): SimulationSnapshot {
    return this.require(id).snapshot();
  }

  listSimulations(): SimulationSnapshot[] {
    return [...this.controllers.values()]
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((c) => c.snapshot());
  }

  getPersonas(id: string): Persona[] {
    return this.require(id).getPersonas();
  }

  getConversations(id: string): Conversation[] {
    return this.require(id).getConversations();
  }

  getInsights(id: string): Insight[] {
    return this.require(id).getInsights();
  }

  getProgress(id: string): Readonly<SimulationProgress> {
    return this.require(id).getProgress();
  }

  async refreshInsights(id: string): Promise<Insight[]> {
    return await this.require(id).refreshInsights();
  }

  async whenSettled(id: string): Promise<SimulationStatus> {
    return await this.require(id).settled();
  }

  /** Removes the entry first so a concurrent second delete fails with NotFound. */
  async deleteSimulation(id: string): Promise<void> {
    const controller = this.require(id);
    this.controllers.delete(id);
    await controller.dispose();
    console.log(`[Simulation] Deleted | id=${id}`);
  }

  async reflectPersonas(context: string, numPersonas: number = DEFAULT_SIMULATION_CONFIG.numPersonas): Promise<PersonaOutline[]> {
    const validContext = validateContext(context);
    const count = validateBound("numPersonas", numPersonas, SIMULATION_LIMITS.MAX_PERSONAS);
    return await reflectPersonas(this.options.gateway, validContext, count);
  }

  async shutdown(): Promise<void> {
    const controllers = [...this.controllers.values()];
    this.controllers.clear();
    const results = await Promise.allSettled(controllers.map((c) => c.dispose()));
    const failures = results.filter((r) => r.status === "rejected").length;
    console.log(`[Simulation] Registry shut down | simulations=${controllers.length} | failures=${failures}`);
  }

  private require(id: string): SimulationController {
    const controller = this.controllers.get(id);
    if (!controller) throw new NotFoundError(id);
    return controller;
  }
}
