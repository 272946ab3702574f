import { loadConfig } from "./config";
import { UsageLedger } from "./llm-usage";
import { createOpenAIModelGateway } from "./model-gateway";
import { createApp } from "./routes";
import { SimulationRegistry } from "./simulation";

function main(): void {
  const config = loadConfig();
  const ledger = new UsageLedger();
  const gateway = createOpenAIModelGateway(config, ledger);
  const registry = new SimulationRegistry({ gateway, ledger, config: config.simulation });

  const app = createApp(registry);
  const server = app.listen(config.port, () => {
    console.log(`[Server] Listening | port=${config.port} | structuredModel=${config.models.structured} | conversationModel=${config.models.conversation}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] Shutdown signal received | signal=${signal}`);
    server.close();
    try {
      await registry.shutdown();
      console.log(`[Server] Shutdown complete | totalTokens=${ledger.overall().totalTokens}`);
      process.exit(0);
    } catch (error) {
      console.error("[Server] Error during shutdown:", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

try {
  main();
} catch (error) {
  console.error("[Config] Failed to start server:", error);
  process.exit(1);
}
