import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema, Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { CommandTarget } from "../cli/repl.js";
import { errorMessage } from "../types.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export const TOOLS: Tool[] = [
  {
    name: "screen_observe",
    description: "Capture the screen and describe what is visible",
    inputSchema: { type: "object", properties: {} }
  },
  {
    name: "screen_suggest",
    description: "Capture the screen and suggest the next action towards a goal",
    inputSchema: {
      type: "object",
      properties: { goal: { type: "string" } },
      required: ["goal"]
    }
  },
  {
    name: "smart_click",
    description: "Find an element by natural-language description and click it. Learned elements are re-found by image matching.",
    inputSchema: {
      type: "object",
      properties: { element: { type: "string", description: "e.g. 'login button'" } },
      required: ["element"]
    }
  },
  {
    name: "mouse_click",
    description: "Click at screen coordinates",
    inputSchema: {
      type: "object",
      properties: {
        x: { type: "number" },
        y: { type: "number" },
        button: { type: "string", enum: ["left", "right"], default: "left" },
        double: { type: "boolean", default: false }
      },
      required: ["x", "y"]
    }
  },
  {
    name: "keyboard_type",
    description: "Type text",
    inputSchema: {
      type: "object",
      properties: { text: { type: "string" } },
      required: ["text"]
    }
  },
  {
    name: "keyboard_press",
    description: "Press a single key (enter, esc, tab, f5, ...)",
    inputSchema: {
      type: "object",
      properties: { key: { type: "string" } },
      required: ["key"]
    }
  },
  {
    name: "keyboard_hotkey",
    description: "Press a key combination, e.g. ctrl+c",
    inputSchema: {
      type: "object",
      properties: { keys: { type: "string" } },
      required: ["keys"]
    }
  },
  {
    name: "mouse_scroll",
    description: "Scroll the mouse wheel (positive=up, negative=down)",
    inputSchema: {
      type: "object",
      properties: { amount: { type: "integer" } },
      required: ["amount"]
    }
  },
  {
    name: "elements_list",
    description: "List learned elements",
    inputSchema: { type: "object", properties: {} }
  },
  {
    name: "elements_clear",
    description: "Forget all learned elements",
    inputSchema: { type: "object", properties: {} }
  }
];

const GoalArgs = z.object({ goal: z.string().min(1) });
const ElementArgs = z.object({ element: z.string().min(1) });
const ClickArgs = z.object({
  x: z.number().int(),
  y: z.number().int(),
  button: z.enum(["left", "right"]).default("left"),
  double: z.boolean().default(false)
});
const TextArgs = z.object({ text: z.string() });
const KeyArgs = z.object({ key: z.string().min(1) });
const HotkeyArgs = z.object({ keys: z.string().min(1) });
const ScrollArgs = z.object({ amount: z.number().int() });

function text(value: string): ToolResult {
  return { content: [{ type: "text", text: value }] };
}

/**
 * Executes one MCP tool call against the agent. Failures come back as
 * `isError` results, never as rejections.
 */
export async function handleToolCall(agent: CommandTarget, name: string, args: unknown = {}): Promise<ToolResult> {
  try {
    switch (name) {
      case "screen_observe": {
        const { analysis } = await agent.observe();
        return text(analysis);
      }
      case "screen_suggest": {
        const { goal } = GoalArgs.parse(args);
        const suggestion = await agent.observeAndSuggest(goal);
        return text(suggestion.text);
      }
      case "smart_click": {
        const { element } = ElementArgs.parse(args);
        const outcome = await agent.smartClick(element);
        if (!outcome.success || !outcome.point) {
          return { ...text(`Could not find element '${element}': ${outcome.diagnostic ?? "no match"}`), isError: true };
        }
        return text(JSON.stringify({ element, x: outcome.point.x, y: outcome.point.y, source: outcome.source }, null, 2));
      }
      case "mouse_click": {
        const { x, y, button, double } = ClickArgs.parse(args);
        const type = double ? "double_click" : button === "right" ? "right_click" : "click";
        await agent.executeAction({ type, x, y });
        return text(`Mouse ${button} ${double ? "double-" : ""}click at (${x}, ${y})`);
      }
      case "keyboard_type": {
        const { text: value } = TextArgs.parse(args);
        await agent.executeAction({ type: "type", text: value });
        return text(`Typed: "${value}"`);
      }
      case "keyboard_press": {
        const { key } = KeyArgs.parse(args);
        await agent.executeAction({ type: "press_key", key });
        return text(`Pressed: ${key}`);
      }
      case "keyboard_hotkey": {
        const { keys } = HotkeyArgs.parse(args);
        await agent.executeAction({ type: "hotkey", keys: keys.split("+").map(k => k.trim()).filter(Boolean) });
        return text(`Shortcut: ${keys}`);
      }
      case "mouse_scroll": {
        const { amount } = ScrollArgs.parse(args);
        await agent.executeAction({ type: "scroll", clicks: amount });
        return text(`Scrolled ${amount > 0 ? "up" : "down"} ${Math.abs(amount)} steps`);
      }
      case "elements_list":
        return text(JSON.stringify(await agent.listLearnedElements(), null, 2));
      case "elements_clear":
        await agent.clearLearnedElements();
        return text("Element cache cleared");
      default:
        return { ...text(`Unknown tool: ${name}`), isError: true };
    }
  } catch (err) {
    if (err instanceof z.ZodError) {
      const issues = err.issues.map(issue => `${issue.path.join(".") || "arguments"}: ${issue.message}`).join("; ");
      return { ...text(`Invalid arguments for ${name}: ${issues}`), isError: true };
    }
    return { ...text(`${name} failed: ${errorMessage(err)}`), isError: true };
  }
}

/**
 * Tool dispatcher that runs calls one after another in arrival order,
 * including calls a client sends concurrently.
 */
export function serializeToolCalls(agent: CommandTarget): (name: string, args?: unknown) => Promise<ToolResult> {
  let busy: Promise<unknown> = Promise.resolve();

  return (name, args) => {
    const result = busy.then(() => handleToolCall(agent, name, args));
    busy = result;
    return result;
  };
}

export function createAgentServer(agent: CommandTarget): Server {
  const server = new Server(
    { name: "desktop-element-agent", version: "1.0.0" },
    { capabilities: { tools: {} } }
  );

  const callTool = serializeToolCalls(agent);
  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
  server.setRequestHandler(CallToolRequestSchema, async request =>
    callTool(request.params.name, request.params.arguments)
  );

  return server;
}

export async function startMcpServer(agent: CommandTarget): Promise<void> {
  const server = createAgentServer(agent);
  await server.connect(new StdioServerTransport());
  console.error("🧠 Desktop Element Agent MCP server running on stdio");
}
