import { randomUUID } from "crypto";
import PQueue from "p-queue";
import type {
  Conversation,
  Insight,
  Outcome,
  Persona,
  SimulationPhase,
  SimulationProgress,
  SimulationSnapshot,
  SimulationStatus,
} from "@shared/types/simulation";
import { isTerminalStatus } from "@shared/types/simulation";
import { InvalidStateError, errorMessage } from "../errors";
import { extractInsights } from "../insight-extraction";
import { emptyTokenUsage, type UsageLedger } from "../llm-usage";
import type { ModelGateway } from "../model-gateway";
import { generatePersonas } from "../persona-generation";
import { runConversation } from "./driver";
import { ProgressTracker } from "./progress";
import type { DriverResult, SimulationRuntimeConfig } from "./types";

const ALLOWED_TRANSITIONS: Record<SimulationStatus, readonly SimulationStatus[]> = {
  pending: ["generating_personas"],
  generating_personas: ["ready", "error"],
  ready: ["running", "error"],
  running: ["completed", "stopped", "error"],
  completed: [],
  stopped: [],
  error: [],
};

const PHASE_FOR_STATUS: Record<SimulationStatus, SimulationPhase> = {
  pending: "idle",
  generating_personas: "generating_personas",
  ready: "idle",
  running: "interviewing",
  completed: "done",
  stopped: "done",
  error: "done",
};

export function canTransition(from: SimulationStatus, to: SimulationStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export interface SimulationControllerOptions {
  id?: string;
  context: string;
  numPersonas: number;
  maxTurns: number;
  gateway: ModelGateway;
  ledger?: UsageLedger;
  config: SimulationRuntimeConfig;
}

type PipelineMode = "prepare" | "start";

function emptyConversation(personaId: string): Conversation {
  return {
    id: randomUUID(),
    personaId,
    messages: [],
    summary: null,
    isComplete: false,
    endReason: null,
    error: null,
    completedTurns: 0,
    startedAt: null,
    completedAt: null,
  };
}

/**
 * Owns one simulation: its lifecycle state machine, the concurrent conversation
 * drivers and the aggregated results. Lifecycle commands run one at a time;
 * status and progress changes happen synchronously between awaits.
 */
export class SimulationController {
  readonly id: string;
  readonly context: string;
  readonly numPersonas: number;
  readonly maxTurns: number;
  readonly createdAt: Date;

  private readonly gateway: ModelGateway;
  private readonly ledger: UsageLedger | undefined;
  private readonly config: SimulationRuntimeConfig;
  private readonly lifecycle = new PQueue({ concurrency: 1 });
  private readonly progress = new ProgressTracker();

  private status: SimulationStatus = "pending";
  private error: string | null = null;
  private diagnostics: string[] = [];
  private personas: Persona[] = [];
  private conversations: Conversation[] = [];
  private insights: Insight[] = [];
  private updatedAt: Date;
  private startedAt: Date | null = null;
  private completedAt: Date | null = null;

  private abortController: AbortController | null = null;
  private driversSettled: Promise<void> | null = null;
  private pipeline: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private disposed = false;

  constructor(options: SimulationControllerOptions) {
    this.id = options.id ?? randomUUID();
    this.context = options.context;
    this.numPersonas = options.numPersonas;
    this.maxTurns = options.maxTurns;
    this.gateway = options.gateway;
    this.ledger = options.ledger;
    this.config = options.config;
    this.createdAt = new Date();
    this.updatedAt = this.createdAt;
  }

  getStatus(): SimulationStatus {
    return this.status;
  }

  prepare(): Promise<void> {
    return this.lifecycle.add(() => {
      if (this.status !== "pending") {
        throw new InvalidStateError("prepare", this.status);
      }
      this.transition("generating_personas");
      this.launchPipeline("prepare");
    }, { throwOnTimeout: true });
  }

  start(): Promise<void> {
    return this.lifecycle.add(() => {
      if (this.status === "pending") {
        this.transition("generating_personas");
        this.launchPipeline("start");
        return;
      }
      if (this.status === "ready") {
        this.launchPipeline("start");
        return;
      }
      throw new InvalidStateError("start", this.status);
    }, { throwOnTimeout: true });
  }

  /** Concurrent callers share one stop. */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    const stopping = this.lifecycle
      .add(() => this.performStop(), { throwOnTimeout: true })
      .finally(() => {
        this.stopping = null;
      });
    this.stopping = stopping;
    return stopping;
  }

  refreshInsights(): Promise<Insight[]> {
    return this.lifecycle.add(async () => {
      if (this.status !== "completed" && this.status !== "stopped") {
        throw new InvalidStateError("refresh insights for", this.status);
      }
      const outcome = await this.runExtraction();
      if (this.disposed) return [];
      this.insights = outcome.value;
      if (outcome.status === "degraded") this.addDiagnostic(outcome.diagnostic);
      this.progress.recordInsights(this.insights.length);
      this.touch();
      return [...this.insights];
    }, { throwOnTimeout: true });
  }

  dispose(): Promise<void> {
    return this.lifecycle.add(async () => {
      if (this.disposed) return;
      if (this.status === "running") {
        await this.performStop();
      }
      this.release();
    }, { throwOnTimeout: true });
  }

  /** Resolves once queued commands and the background pipeline have finished. */
  async settled(): Promise<SimulationStatus> {
    await this.lifecycle.onIdle();
    if (this.pipeline) await this.pipeline;
    return this.status;
  }

  snapshot(): SimulationSnapshot {
    return {
      id: this.id,
      context: this.context,
      numPersonas: this.numPersonas,
      maxTurns: this.maxTurns,
      status: this.status,
      error: this.error,
      diagnostics: [...this.diagnostics],
      personaCount: this.personas.length,
      conversationCount: this.conversations.length,
      insightCount: this.insights.length,
      tokenUsage: this.ledger ? this.ledger.totalsFor(this.id) : emptyTokenUsage(),
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
    };
  }

  getPersonas(): Persona[] {
    return [...this.personas];
  }

  getConversations(): Conversation[] {
    return this.conversations.map((c) => ({ ...c, messages: [...c.messages] }));
  }

  getInsights(): Insight[] {
    return [...this.insights];
  }

  getProgress(): Readonly<SimulationProgress> {
    return this.progress.snapshot();
  }

  private launchPipeline(mode: PipelineMode): void {
    this.pipeline = this.runPipeline(mode).catch((err) => {
      console.error(`[Simulation] Pipeline failed | id=${this.id} | error=${errorMessage(err)}`);
      this.fail(`Simulation pipeline failed: ${errorMessage(err)}`);
    });
  }

  private async runPipeline(mode: PipelineMode): Promise<void> {
    if (this.status === "generating_personas") {
      let personas: Persona[];
      try {
        personas = await generatePersonas(this.gateway, this.context, this.numPersonas, { simulationId: this.id });
      } catch (err) {
        if (this.disposed) return;
        this.fail(`Persona generation failed: ${errorMessage(err)}`);
        return;
      }
      if (this.disposed) return;
      this.personas = personas;
      this.transition("ready");
      if (mode === "prepare") return;
    }

    await this.runInterviews();
  }

  private async runInterviews(): Promise<void> {
    const abort = new AbortController();
    this.abortController = abort;
    this.conversations = this.personas.map((p) => emptyConversation(p.id));

    this.transition("running");
    this.startedAt = new Date();
    this.progress.beginInterviews(
      this.maxTurns,
      this.personas.map((persona, index) => ({
        conversationId: this.conversations[index].id,
        personaId: persona.id,
        personaName: persona.name,
      })),
    );
    console.log(`[Simulation] Interviews started | id=${this.id} | personas=${this.personas.length} | maxTurns=${this.maxTurns}`);

    const runs = this.personas.map((persona, index) =>
      this.superviseDriver(persona, this.conversations[index], abort.signal),
    );
    const settled = Promise.allSettled(runs);
    this.driversSettled = settled.then(() => undefined);
    const results = await settled;

    if (this.disposed || abort.signal.aborted || this.status !== "running") return;

    const driverResults = results
      .filter((r): r is PromiseFulfilledResult<DriverResult> => r.status === "fulfilled")
      .map((r) => r.value);
    for (const result of driverResults) {
      for (const diagnostic of result.diagnostics) this.addDiagnostic(diagnostic);
    }

    await this.finalize(driverResults);
  }

  private async superviseDriver(persona: Persona, conversation: Conversation, signal: AbortSignal): Promise<DriverResult> {
    try {
      return await runConversation({
        gateway: this.gateway,
        simulationId: this.id,
        context: this.context,
        persona,
        conversation,
        maxTurns: this.maxTurns,
        signal,
        canAppend: () => !this.disposed && !isTerminalStatus(this.status),
        onTurnCompleted: (updated) => {
          this.progress.recordTurn(updated.id, updated.messages.length);
          this.touch();
        },
      });
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[Simulation] Driver crashed | id=${this.id} | conversation=${conversation.id} | error=${message}`);
      if (!this.disposed && !isTerminalStatus(this.status)) {
        conversation.error = message;
        conversation.endReason = "error";
        conversation.isComplete = true;
        conversation.completedAt = new Date();
      }
      return { conversationId: conversation.id, endReason: "error", error: message, diagnostics: [] };
    } finally {
      if (!this.disposed && !isTerminalStatus(this.status)) {
        this.progress.recordConversationEnd(conversation.id, conversation.summary !== null);
      }
    }
  }

  private async finalize(results: DriverResult[]): Promise<void> {
    const failed = results.filter((r) => r.endReason === "error");
    if (this.conversations.length > 0 && failed.length === this.conversations.length) {
      const firstError = failed[0]?.error ?? "unknown error";
      this.fail(`All ${failed.length} conversations failed; first error: ${firstError}`);
      return;
    }
    if (failed.length > 0) {
      this.addDiagnostic(`${failed.length} of ${this.conversations.length} conversations ended with an error`);
    }

    this.progress.update({ phase: "extracting_insights" });
    this.touch();
    const outcome = await this.runExtraction();
    // A stop that landed during extraction owns the final state; the late result is discarded.
    if (this.disposed || this.status !== "running") return;

    this.insights = outcome.value;
    if (outcome.status === "degraded") this.addDiagnostic(outcome.diagnostic);
    this.progress.recordInsights(this.insights.length);

    this.transition("completed");
    this.completedAt = new Date();
    console.log(`[Simulation] Completed | id=${this.id} | conversations=${this.conversations.length} | insights=${this.insights.length} | diagnostics=${this.diagnostics.length}`);
  }

  private runExtraction(): Promise<Outcome<Insight[]>> {
    return extractInsights(this.gateway, {
      context: this.context,
      conversations: this.conversations,
      personas: this.personas,
      charLimit: this.config.insightTranscriptCharLimit,
      attribution: { simulationId: this.id },
    });
  }

  private async performStop(): Promise<void> {
    if (this.status !== "running") {
      throw new InvalidStateError("stop", this.status);
    }
    console.log(`[Simulation] Stop requested | id=${this.id}`);
    this.abortController?.abort();

    const drained = await this.waitForDrivers(this.config.stopTimeoutMs);
    if (!drained) {
      console.warn(`[Simulation] Drivers did not exit in time, abandoning | id=${this.id} | timeoutMs=${this.config.stopTimeoutMs}`);
    }
    if (this.status !== "running") return;

    for (const conversation of this.conversations) {
      if (conversation.isComplete) continue;
      conversation.endReason = "cancelled";
      conversation.isComplete = true;
      conversation.completedAt = new Date();
    }
    this.progress.deactivateAll();
    this.transition("stopped");
    this.completedAt = new Date();
  }

  private async waitForDrivers(timeoutMs: number): Promise<boolean> {
    if (!this.driversSettled) return true;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.driversSettled.then(() => true), timeout]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  private transition(next: SimulationStatus): void {
    const from = this.status;
    if (!canTransition(from, next)) {
      throw new InvalidStateError(`move to "${next}"`, from);
    }
    this.status = next;
    this.progress.transition(next, PHASE_FOR_STATUS[next]);
    this.touch();
    console.log(`[Simulation] Status changed | id=${this.id} | from=${from} | to=${next}`);
  }

  private fail(message: string): void {
    if (this.disposed || !canTransition(this.status, "error")) {
      console.warn(`[Simulation] Failure ignored in status ${this.status} | id=${this.id} | error=${message}`);
      return;
    }
    this.error = message;
    this.transition("error");
    this.completedAt = new Date();
    console.error(`[Simulation] Failed | id=${this.id} | error=${message}`);
  }

  private addDiagnostic(diagnostic: string): void {
    this.diagnostics.push(diagnostic);
    console.warn(`[Simulation] Diagnostic | id=${this.id} | ${diagnostic}`);
  }

  private touch(): void {
    this.updatedAt = new Date();
  }

  private release(): void {
    this.disposed = true;
    this.abortController?.abort();
    this.personas = [];
    this.conversations = [];
    this.insights = [];
    this.ledger?.forget(this.id);
    console.log(`[Simulation] Released | id=${this.id} | status=${this.status}`);
  }
}
