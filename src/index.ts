#!/usr/bin/env node
import { config } from "dotenv";
import { createDesktopAgent } from "./agent/create-agent.js";
import { runInteractive } from "./cli/repl.js";
import { ConfigError, loadConfig } from "./config.js";
import { startMcpServer } from "./mcp/agent-server.js";
import { CorruptCacheError } from "./memory/element-store.js";
import { errorMessage } from "./types.js";

config();

async function bootstrap() {
  const settings = loadConfig();

  if (settings.mode === "mcp") {
    // stdout carries protocol frames; everything else goes to stderr
    console.log = console.error;
  }

  console.log("🚀 Starting Desktop Element Agent...");
  console.log(`📋 Mode: ${settings.mode.toUpperCase()}`);

  const agent = await createDesktopAgent(settings);
  console.log("Agent initialized successfully!");

  if (settings.mode === "mcp") {
    await startMcpServer(agent);
    process.on("SIGINT", () => {
      console.log("\n👋 MCP server shutting down...");
      process.exit(0);
    });
    return;
  }

  await runInteractive(agent);
  console.log("\n👋 Goodbye!");
  process.exit(0);
}

bootstrap().catch(err => {
  if (err instanceof ConfigError) {
    console.error(`❌ ${err.message}`);
    console.error("   Copy .env.example to .env and fill in your settings.");
  } else if (err instanceof CorruptCacheError) {
    console.error(`❌ ${err.message}`);
    console.error("   Fix or remove the file; the agent will not start with an unreadable element cache.");
  } else {
    console.error("❌ Fatal error:", errorMessage(err));
  }
  process.exit(1);
});
