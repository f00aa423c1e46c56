import dotenv from "dotenv";
import type { Server } from "http";
import { registerBuiltinAgents } from "./agents/index.js";
import { AgentManager } from "./core/AgentManager.js";
import { loadConfigFile } from "./core/config.js";
import { ConfigError } from "./core/errors.js";
import { LocalEventHub } from "./core/EventHub.js";
import { AgentEventType } from "./core/types.js";
import { ConsoleOutput } from "./outputs/ConsoleOutput.js";
import { HttpOutput } from "./outputs/HttpOutput.js";
import { MemoryOutput } from "./outputs/MemoryOutput.js";
import { createServer } from "./server.js";
import { registerBuiltinSources } from "./sources/index.js";

// Load environment variables
dotenv.config();

/**
 * Main entry point for the agent runtime
 */
async function main() {
  console.log("Starting healthcare agent runtime...");

  const configPath = process.env.AGENT_CONFIG_PATH || "config/agents.json";

  try {
    const hub = new LocalEventHub();
    const eventLog = new MemoryOutput();
    hub.subscribe(new ConsoleOutput());
    hub.subscribe(eventLog);
    if (process.env.EVENT_INGEST_URL) {
      hub.subscribe(new HttpOutput({ url: process.env.EVENT_INGEST_URL }));
    }

    const manager = new AgentManager(await loadConfigFile(configPath), {
      hub,
      agents: registerBuiltinAgents(),
      sources: registerBuiltinSources(),
    });

    manager.on(AgentEventType.AGENT_SUSPENDED, (event) => {
      console.warn(
        `Agent suspended: ${event.agentId} at ${event.timestamp.toISOString()}, retry in ${event.backoffMs}ms`
      );
    });

    manager.on(AgentEventType.AGENT_RESUMED, (event) => {
      console.log(`Agent resumed: ${event.agentId} at ${event.timestamp.toISOString()}`);
    });

    manager.on(AgentEventType.CYCLE_COMPLETED, (event) => {
      if (event.outcome && event.outcome.events.length > 0) {
        console.log(
          `Agent ${event.agentId} published ${event.outcome.acks.length}/${event.outcome.events.length} event(s)`
        );
      }
    });

    await manager.startAllAgents();

    const app = createServer({
      manager,
      eventLog,
      apiKey: process.env.AGENT_API_KEY || undefined,
    });
    const port = Number(process.env.PORT || 3001);
    const server = app.listen(port, () => {
      console.log(`Agent runtime listening on port ${port}`);
    });

    console.log("Healthcare agent runtime started successfully");

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      console.log(`Received ${signal}, shutting down agent runtime...`);
      await closeServer(server);
      await manager.shutdown();
      await hub.close();
      process.exit(0);
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.on(signal, () => {
        shutdown(signal).catch((error) => {
          console.error("Error during shutdown:", error);
          process.exit(1);
        });
      });
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration in ${configPath} is invalid:\n${error.message}`);
    } else {
      console.error("Error starting healthcare agent runtime:", error);
    }
    process.exit(1);
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

// Run the main function
main().catch((error) => {
  console.error(error);
  process.exit(1);
});
