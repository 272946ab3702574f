import { describe, it, expect } from "vitest";
import { SimulationRegistry } from "../simulation";
import { InvalidArgumentError, InvalidStateError, NotFoundError, GatewayError } from "../errors";
import PQueue from "p-queue";
import { UsageLedger } from "../llm-usage";
import { OpenAIModelGateway } from "../model-gateway";
import {
  FakeModelGateway,
  StubChatClient,
  TEST_RUNTIME_CONFIG,
  createDeferred,
  makeRawPersona,
  waitFor,
} from "./helpers/fake-gateway";

const CONTEXT = "Mobile budgeting app for students";

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function setup(gateway = new FakeModelGateway(), config = TEST_RUNTIME_CONFIG) {
  const ledger = new UsageLedger();
  const registry = new SimulationRegistry({ gateway, ledger, config });
  return { gateway, registry, ledger };
}

describe("createSimulation", () => {
  it("creates a pending simulation with defaults", () => {
    const { registry } = setup();
    const id = registry.createSimulation(`  ${CONTEXT}  `);
    const snapshot = registry.getSimulation(id);

    expect(snapshot.status).toBe("pending");
    expect(snapshot.context).toBe(CONTEXT);
    expect(snapshot.numPersonas).toBe(5);
    expect(snapshot.maxTurns).toBe(10);
    expect(snapshot.personaCount).toBe(0);
    expect(registry.getProgress(id).completionPercentage).toBe(0);
  });

  it("rejects invalid parameters", () => {
    const { registry } = setup();
    expect(() => registry.createSimulation("   ")).toThrow(InvalidArgumentError);
    expect(() => registry.createSimulation("x".repeat(4001))).toThrow("context must be at most 4000 characters");
    expect(() => registry.createSimulation(CONTEXT, 0)).toThrow("numPersonas must be an integer between 1 and 10");
    expect(() => registry.createSimulation(CONTEXT, 11)).toThrow(InvalidArgumentError);
    expect(() => registry.createSimulation(CONTEXT, 2.5)).toThrow(InvalidArgumentError);
    expect(() => registry.createSimulation(CONTEXT, 3, 31)).toThrow("maxTurns must be an integer between 1 and 30");
    expect(registry.listSimulations()).toEqual([]);
  });
});

describe("simulation lifecycle", () => {
  it("runs three personas for five turns to completion", async () => {
    const { registry, ledger } = setup();
    const id = registry.createSimulation(CONTEXT, 3, 5);
    expect(registry.getSimulation(id).status).toBe("pending");

    await registry.startSimulation(id);
    const status = await registry.whenSettled(id);

    expect(status).toBe("completed");
    expect(registry.getPersonas(id)).toHaveLength(3);
    const conversations = registry.getConversations(id);
    expect(conversations).toHaveLength(3);
    for (const conversation of conversations) {
      expect(conversation.messages).toHaveLength(10);
      expect(conversation.messages.length).toBeLessThanOrEqual(10);
      conversation.messages.forEach((message, index) => {
        expect(message.role).toBe(index % 2 === 0 ? "interviewer" : "persona");
      });
      expect(conversation.endReason).toBe("max_turns");
      expect(conversation.isComplete).toBe(true);
    }

    const insights = registry.getInsights(id);
    expect(insights.length).toBeGreaterThan(0);
    for (const insight of insights) {
      expect(Number.isInteger(insight.confidence)).toBe(true);
      expect(insight.confidence).toBeGreaterThanOrEqual(1);
      expect(insight.confidence).toBeLessThanOrEqual(5);
    }

    const personas = registry.getPersonas(id);
    expect(registry.getProgress(id)).toEqual({
      status: "completed",
      phase: "done",
      totalTurns: 15,
      completedTurns: 15,
      activeConversations: 0,
      completedConversations: 3,
      totalMessages: 30,
      insightsCount: 2,
      conversations: conversations.map((conversation, index) => ({
        conversationId: conversation.id,
        personaId: personas[index].id,
        personaName: `Persona ${index + 1}`,
        messageCount: 10,
        completedTurns: 5,
        isActive: false,
        hasSummary: true,
        progressPercentage: 100,
      })),
      completionPercentage: 100,
    });

    const snapshot = registry.getSimulation(id);
    expect(snapshot.personaCount).toBe(3);
    expect(snapshot.conversationCount).toBe(3);
    expect(snapshot.insightCount).toBe(2);
    expect(snapshot.error).toBeNull();
    expect(snapshot.startedAt).toBeInstanceOf(Date);
    expect(snapshot.completedAt).toBeInstanceOf(Date);
    expect(snapshot.tokenUsage).toEqual(ledger.totalsFor(id));
  });

  it("returns copies of conversations", async () => {
    const { registry } = setup();
    const id = registry.createSimulation(CONTEXT, 1, 1);
    await registry.startSimulation(id);
    await registry.whenSettled(id);

    const copy = registry.getConversations(id);
    copy[0].messages.length = 0;
    expect(registry.getConversations(id)[0].messages).toHaveLength(2);
  });

  it("rejects a second start while the first run is in progress", async () => {
    const { registry } = setup();
    const id = registry.createSimulation(CONTEXT, 3, 5);

    await registry.startSimulation(id);
    await expect(registry.startSimulation(id)).rejects.toBeInstanceOf(InvalidStateError);

    expect(await registry.whenSettled(id)).toBe("completed");
    expect(registry.getPersonas(id)).toHaveLength(3);
    expect(registry.getConversations(id)).toHaveLength(3);
  });

  it("rejects a second start once interviews are running", async () => {
    const gateway = new FakeModelGateway();
    const gate = createDeferred();
    gateway.onReply("persona_reply", async () => {
      await gate.promise;
      return "Sure.";
    });
    const { registry } = setup(gateway);
    const id = registry.createSimulation(CONTEXT, 2, 2);

    await registry.startSimulation(id);
    await waitFor(() => registry.getSimulation(id).status === "running");
    await expect(registry.startSimulation(id)).rejects.toThrow('Cannot start a simulation in status "running"');

    gate.resolve();
    expect(await registry.whenSettled(id)).toBe("completed");
  });

  it("keeps completed turns non-decreasing while running", async () => {
    const gateway = new FakeModelGateway();
    const { registry } = setup(gateway);
    const observed: number[] = [];
    let id = "";
    gateway.onReply("persona_reply", async () => {
      observed.push(registry.getProgress(id).completedTurns);
      await new Promise((resolve) => setTimeout(resolve, 1));
      return "Okay.";
    });
    id = registry.createSimulation(CONTEXT, 3, 4);

    await registry.startSimulation(id);
    await registry.whenSettled(id);

    expect(observed).toHaveLength(12);
    expect(observed).toEqual([...observed].sort((a, b) => a - b));
    expect(registry.getProgress(id).completedTurns).toBe(12);
  });

  it("prepares personas without starting interviews", async () => {
    const { registry, gateway } = setup();
    const id = registry.createSimulation(CONTEXT, 2, 1);

    await registry.prepareSimulation(id);
    expect(await registry.whenSettled(id)).toBe("ready");
    expect(registry.getPersonas(id)).toHaveLength(2);
    expect(registry.getConversations(id)).toEqual([]);
    expect(registry.getProgress(id).completionPercentage).toBe(10);
    expect(gateway.callsFor("persona_reply")).toBe(0);

    await expect(registry.prepareSimulation(id)).rejects.toBeInstanceOf(InvalidStateError);

    await registry.startSimulation(id);
    expect(await registry.whenSettled(id)).toBe("completed");
    expect(gateway.callsFor("persona_generation")).toBe(1);
  });

  it("moves to error when persona generation fails", async () => {
    const gateway = new FakeModelGateway().onStructured("persona_generation", () => ({ personas: [] }));
    const { registry } = setup(gateway);
    const id = registry.createSimulation(CONTEXT, 2, 2);

    await registry.startSimulation(id);
    expect(await registry.whenSettled(id)).toBe("error");

    const snapshot = registry.getSimulation(id);
    expect(snapshot.error).toMatch(/^Persona generation failed: /);
    expect(snapshot.conversationCount).toBe(0);
    expect(gateway.callsFor("persona_reply")).toBe(0);
  });

  it("moves to error when every conversation fails", async () => {
    const gateway = new FakeModelGateway().onReply("persona_reply", () => {
      throw new GatewayError("auth", "Invalid API key");
    });
    const { registry } = setup(gateway);
    const id = registry.createSimulation(CONTEXT, 3, 2);

    await registry.startSimulation(id);
    expect(await registry.whenSettled(id)).toBe("error");

    expect(registry.getSimulation(id).error).toBe("All 3 conversations failed; first error: Invalid API key");
    expect(registry.getConversations(id).every((c) => c.endReason === "error")).toBe(true);
    expect(gateway.callsFor("insight_extraction")).toBe(0);
  });

  it("completes with a diagnostic when only some conversations fail", async () => {
    const gateway = new FakeModelGateway();
    const { registry } = setup(gateway);
    gateway.onReply("persona_reply", (request) => {
      if (request.messages[0].content.includes("PERSONA: Persona 2\n")) {
        throw new GatewayError("invalid_request", "Context too long");
      }
      return "Okay.";
    });
    const id = registry.createSimulation(CONTEXT, 3, 2);

    await registry.startSimulation(id);
    expect(await registry.whenSettled(id)).toBe("completed");

    const endReasons = registry.getConversations(id).map((c) => c.endReason);
    expect(endReasons).toEqual(["max_turns", "error", "max_turns"]);
    expect(registry.getSimulation(id).diagnostics).toContain("1 of 3 conversations ended with an error");
  });

  it("records degraded insight extraction as a diagnostic", async () => {
    const gateway = new FakeModelGateway().onStructured("insight_extraction", () => {
      throw new GatewayError("server_error", "upstream down");
    });
    const { registry } = setup(gateway);
    const id = registry.createSimulation(CONTEXT, 1, 1);

    await registry.startSimulation(id);
    expect(await registry.whenSettled(id)).toBe("completed");
    expect(registry.getInsights(id)).toEqual([]);
    expect(registry.getSimulation(id).diagnostics).toEqual(["Insight extraction failed: upstream down"]);
  });
});

describe("stopSimulation", () => {
  it("stops mid-run and appends nothing afterwards", async () => {
    const gateway = new FakeModelGateway();
    const gate = createDeferred();
    const replies = new Map<string, number>();
    gateway.onReply("persona_reply", async (request) => {
      const conversationId = request.attribution?.conversationId ?? "";
      const count = (replies.get(conversationId) ?? 0) + 1;
      replies.set(conversationId, count);
      if (count >= 2) await gate.promise;
      return "Let me think about that.";
    });
    const { registry } = setup(gateway);
    const id = registry.createSimulation(CONTEXT, 2, 10);

    await registry.startSimulation(id);
    await waitFor(() => registry.getProgress(id).completedTurns === 2);

    const stopping = registry.stopSimulation(id);
    await pause(5);
    gate.resolve();
    await stopping;

    expect(registry.getSimulation(id).status).toBe("stopped");
    const atStop = registry.getConversations(id).map((c) => c.messages.length);
    for (const conversation of registry.getConversations(id)) {
      expect(conversation.endReason).toBe("cancelled");
      expect(conversation.isComplete).toBe(true);
      expect(conversation.completedTurns).toBeLessThanOrEqual(2);
    }

    await registry.whenSettled(id);
    await pause(10);
    expect(registry.getConversations(id).map((c) => c.messages.length)).toEqual(atStop);
    expect(registry.getSimulation(id).status).toBe("stopped");
  });

  it("abandons drivers that do not exit within the stop timeout", async () => {
    const gateway = new FakeModelGateway();
    const gate = createDeferred();
    const replies = new Map<string, number>();
    gateway.onReply("persona_reply", async (request) => {
      const conversationId = request.attribution?.conversationId ?? "";
      const count = (replies.get(conversationId) ?? 0) + 1;
      replies.set(conversationId, count);
      if (count >= 2) await gate.promise;
      return "Hmm.";
    });
    const { registry } = setup(gateway, { ...TEST_RUNTIME_CONFIG, stopTimeoutMs: 20 });
    const id = registry.createSimulation(CONTEXT, 2, 10);

    await registry.startSimulation(id);
    await waitFor(() => registry.getProgress(id).completedTurns === 2);

    await registry.stopSimulation(id);
    expect(registry.getSimulation(id).status).toBe("stopped");
    expect(registry.getProgress(id).activeConversations).toBe(0);
    const progressAtStop = registry.getProgress(id);

    gate.resolve();
    await registry.whenSettled(id);

    const conversations = registry.getConversations(id);
    expect(conversations.map((c) => c.messages.length)).toEqual([2, 2]);
    expect(conversations.every((c) => c.endReason === "cancelled")).toBe(true);
    expect(registry.getProgress(id)).toBe(progressAtStop);
    expect(progressAtStop.totalMessages).toBe(4);
    expect(progressAtStop.conversations.map((row) => [row.messageCount, row.progressPercentage, row.isActive, row.hasSummary]))
      .toEqual([[2, 10, false, false], [2, 10, false, false]]);
  });

  it("discards insights that arrive after a stop during extraction", async () => {
    const gateway = new FakeModelGateway();
    const gate = createDeferred();
    gateway.onStructured("insight_extraction", async () => {
      await gate.promise;
      return { insights: [{ theme: "Late", description: "Arrives after the stop", confidence: 4, sourceConversations: [1] }] };
    });
    const { registry } = setup(gateway);
    const id = registry.createSimulation(CONTEXT, 1, 1);

    await registry.startSimulation(id);
    await waitFor(() => gateway.callsFor("insight_extraction") === 1);
    expect(registry.getProgress(id).completionPercentage).toBe(90);

    await registry.stopSimulation(id);
    gate.resolve();

    expect(await registry.whenSettled(id)).toBe("stopped");
    expect(registry.getInsights(id)).toEqual([]);
    expect(registry.getSimulation(id).insightCount).toBe(0);
    expect(registry.getProgress(id).insightsCount).toBe(0);
    expect(registry.getProgress(id).completionPercentage).toBe(90);
  });

  it("joins a concurrent stop", async () => {
    const gateway = new FakeModelGateway();
    const gate = createDeferred();
    gateway.onReply("persona_reply", async () => {
      await gate.promise;
      return "Sure.";
    });
    const { registry } = setup(gateway);
    const id = registry.createSimulation(CONTEXT, 1, 3);

    await registry.startSimulation(id);
    await waitFor(() => registry.getSimulation(id).status === "running");

    const first = registry.stopSimulation(id);
    const second = registry.stopSimulation(id);
    await pause(5);
    gate.resolve();
    await Promise.all([first, second]);
    expect(registry.getSimulation(id).status).toBe("stopped");
  });

  it("rejects stop outside running without changing state", async () => {
    const { registry } = setup();
    const id = registry.createSimulation(CONTEXT, 1, 1);

    await expect(registry.stopSimulation(id)).rejects.toThrow('Cannot stop a simulation in status "pending"');
    expect(registry.getSimulation(id).status).toBe("pending");

    await registry.startSimulation(id);
    await registry.whenSettled(id);
    await expect(registry.stopSimulation(id)).rejects.toBeInstanceOf(InvalidStateError);
    expect(registry.getSimulation(id).status).toBe("completed");
  });
});

describe("refreshInsights", () => {
  it("replaces insights wholesale after completion", async () => {
    const gateway = new FakeModelGateway();
    const { registry } = setup(gateway);
    const id = registry.createSimulation(CONTEXT, 1, 1);

    await expect(registry.refreshInsights(id)).rejects.toBeInstanceOf(InvalidStateError);

    await registry.startSimulation(id);
    await registry.whenSettled(id);
    const before = registry.getInsights(id);

    gateway.onStructured("insight_extraction", () => ({
      insights: [{ theme: "Fresh", description: "A new take", confidence: 3, sourceConversations: [1] }],
    }));
    const refreshed = await registry.refreshInsights(id);

    expect(refreshed.map((i) => i.theme)).toEqual(["Fresh"]);
    expect(registry.getInsights(id)).toEqual(refreshed);
    expect(before.map((i) => i.theme)).toEqual(["Tracking small purchases", "Irregular income"]);
    expect(registry.getSimulation(id).status).toBe("completed");
  });
});

describe("deleteSimulation", () => {
  it("removes the simulation and fails NotFound afterwards", async () => {
    const { registry } = setup();
    const id = registry.createSimulation(CONTEXT, 1, 1);

    await registry.deleteSimulation(id);
    expect(() => registry.getSimulation(id)).toThrow(NotFoundError);
    await expect(registry.deleteSimulation(id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("fails NotFound for an unknown id without side effects", async () => {
    const { registry } = setup();
    const id = registry.createSimulation(CONTEXT, 1, 1);

    await expect(registry.deleteSimulation("missing")).rejects.toThrow("Simulation missing not found");
    expect(registry.listSimulations().map((s) => s.id)).toEqual([id]);
  });

  it("stops a running simulation before releasing it", async () => {
    const gateway = new FakeModelGateway();
    const gate = createDeferred();
    gateway.onReply("persona_reply", async () => {
      await gate.promise;
      return "Sure.";
    });
    const { registry } = setup(gateway);
    const id = registry.createSimulation(CONTEXT, 2, 3);

    await registry.startSimulation(id);
    await waitFor(() => gateway.callsFor("persona_reply") === 2);

    const deleting = registry.deleteSimulation(id);
    expect(() => registry.getSimulation(id)).toThrow(NotFoundError);
    await pause(5);
    gate.resolve();
    await deleting;
    expect(gateway.callsFor("insight_extraction")).toBe(0);
  });

  it("keeps no usage for a simulation deleted while a model call is in flight", async () => {
    const gate = createDeferred();
    const client = new StubChatClient(async () => {
      await gate.promise;
      return JSON.stringify({ personas: [makeRawPersona(0)] });
    });
    const ledger = new UsageLedger();
    const queue = new PQueue({ concurrency: 4 });
    const gateway = new OpenAIModelGateway({
      client,
      models: { structured: "test-structured", conversation: "test-conversation" },
      retry: { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 1 },
      timeoutMs: 5000,
      queue,
      ledger,
    });
    const registry = new SimulationRegistry({ gateway, ledger, config: TEST_RUNTIME_CONFIG });
    const id = registry.createSimulation(CONTEXT, 1, 1);

    await registry.startSimulation(id);
    await waitFor(() => client.requests.length === 1);
    await registry.deleteSimulation(id);
    gate.resolve();
    await queue.onIdle();

    expect(client.requests).toHaveLength(1);
    expect(ledger.totalsFor(id).calls).toBe(0);
    expect(ledger.trackedSimulationCount()).toBe(0);
    expect(ledger.overall()).toEqual({ calls: 1, promptTokens: 5, completionTokens: 5, totalTokens: 10 });
  });
});

describe("registry", () => {
  it("lists simulations newest first", async () => {
    const { registry } = setup();
    const first = registry.createSimulation("First context", 1, 1);
    const second = registry.createSimulation("Second context", 1, 1);

    expect(registry.listSimulations().map((s) => s.id)).toEqual([second, first]);
  });

  it("reflects personas without touching the registry", async () => {
    const { registry, gateway } = setup();
    const outlines = await registry.reflectPersonas(CONTEXT, 2);

    expect(outlines).toHaveLength(2);
    expect(registry.listSimulations()).toEqual([]);
    expect(gateway.callsFor("persona_reflection")).toBe(1);
    await expect(registry.reflectPersonas("", 2)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("throws NotFound for unknown ids", async () => {
    const { registry } = setup();
    expect(() => registry.getPersonas("nope")).toThrow(NotFoundError);
    expect(() => registry.getProgress("nope")).toThrow("Simulation nope not found");
    await expect(registry.startSimulation("nope")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("disposes every simulation on shutdown", async () => {
    const gateway = new FakeModelGateway();
    const gate = createDeferred();
    gateway.onReply("persona_reply", async () => {
      await gate.promise;
      return "Sure.";
    });
    const { registry } = setup(gateway);
    const running = registry.createSimulation(CONTEXT, 1, 3);
    registry.createSimulation(CONTEXT, 1, 3);

    await registry.startSimulation(running);
    await waitFor(() => gateway.callsFor("persona_reply") === 1);

    const shuttingDown = registry.shutdown();
    await pause(5);
    gate.resolve();
    await shuttingDown;
    expect(registry.listSimulations()).toEqual([]);
  });
});
