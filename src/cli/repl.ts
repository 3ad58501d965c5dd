import * as readline from "readline";
import { DesktopAgent } from "../agent/desktop-agent.js";
import { errorMessage } from "../types.js";
import { Command, HELP_TEXT, parseCommand } from "./commands.js";

export type CommandTarget = Pick<
  DesktopAgent,
  "observe" | "observeAndSuggest" | "executeAction" | "smartClick" | "listLearnedElements" | "clearLearnedElements"
>;

/**
 * Runs one command against the agent. Returns false when the loop should stop.
 */
export async function runCommand(agent: CommandTarget, command: Command): Promise<boolean> {
  switch (command.kind) {
    case "quit":
      console.log("👋 Exiting agent...");
      return false;
    case "help":
      console.log(HELP_TEXT);
      break;
    case "observe":
      await agent.observe();
      break;
    case "goal": {
      const suggestion = await agent.observeAndSuggest(command.goal);
      if (suggestion.action) {
        console.log(`💡 Next: ${suggestion.action.action} → ${suggestion.action.target}`);
      }
      break;
    }
    case "smart_click": {
      const outcome = await agent.smartClick(command.element);
      if (outcome.success && outcome.point) {
        const how = outcome.source === "template" ? "matched template" : "learned from screen";
        console.log(`✅ Clicked '${command.element}' at (${outcome.point.x}, ${outcome.point.y}) - ${how}`);
      } else {
        console.log(`❌ Could not find element '${command.element}'${outcome.diagnostic ? ` (${outcome.diagnostic})` : ""}`);
      }
      break;
    }
    case "action":
      await agent.executeAction(command.action);
      break;
    case "list_elements": {
      const elements = await agent.listLearnedElements();
      if (elements.length === 0) {
        console.log("No elements learned yet");
      } else {
        console.log("\nLearned elements:");
        for (const element of elements) console.log(`  - ${element}`);
      }
      break;
    }
    case "clear_elements":
      await agent.clearLearnedElements();
      break;
  }
  return true;
}

export async function runInteractive(agent: CommandTarget): Promise<void> {
  console.log(`\n${"=".repeat(60)}`);
  console.log("DESKTOP ELEMENT AGENT - Interactive Mode");
  console.log("=".repeat(60));
  console.log(`\n${HELP_TEXT}\n`);
  console.log("=".repeat(60));

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "\nEnter command: "
  });

  await new Promise<void>(resolve => {
    let busy = Promise.resolve();

    rl.on("line", (line: string) => {
      // Commands run strictly one after another
      busy = busy.then(async () => {
        const parsed = parseCommand(line);
        if (parsed.kind === "empty") {
          rl.prompt();
          return;
        }
        if (parsed.kind === "error") {
          console.log(parsed.message);
          rl.prompt();
          return;
        }

        try {
          if (!(await runCommand(agent, parsed))) {
            rl.close();
            return;
          }
        } catch (err) {
          console.error(`\n❌ Error: ${errorMessage(err)}`);
        }
        rl.prompt();
      });
    });

    rl.on("SIGINT", () => {
      console.log("\n\nInterrupted by user. Exiting...");
      rl.close();
    });

    rl.on("close", () => {
      busy.then(resolve, resolve);
    });

    rl.prompt();
  });
}
