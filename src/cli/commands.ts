import { AgentAction } from "../agent/desktop-agent.js";

export type Command =
  | { kind: "observe" }
  | { kind: "goal"; goal: string }
  | { kind: "smart_click"; element: string }
  | { kind: "action"; action: AgentAction }
  | { kind: "list_elements" }
  | { kind: "clear_elements" }
  | { kind: "help" }
  | { kind: "quit" };

export type ParsedCommand = Command | { kind: "empty" } | { kind: "error"; message: string };

export const HELP_TEXT = `
Commands:
  observe                - Take screenshot and analyze
  goal <your goal>       - Get action suggestion for a goal
  smart_click <element>  - AI finds and clicks element (e.g. 'smart_click login button')
  click <x> <y>          - Click at coordinates
  double_click <x> <y>   - Double click at coordinates
  right_click <x> <y>    - Right click at coordinates
  move <x> <y>           - Move the mouse
  type <text>            - Type text
  press <key>            - Press a key (enter, esc, tab, ...)
  hotkey <k1+k2>         - Press a key combination (e.g. ctrl+c)
  scroll <amount>        - Scroll (positive=up, negative=down)
  wait <seconds>         - Wait for seconds
  list_elements          - Show all learned elements
  clear_elements         - Forget all learned elements
  help                   - Show this list
  quit                   - Exit
`.trim();

function toInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^-?\d+$/.test(value)) return undefined;
  return Number.parseInt(value, 10);
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function point(
  type: "click" | "double_click" | "right_click" | "move",
  args: string[]
): ParsedCommand {
  const x = toInt(args[0]);
  const y = toInt(args[1]);
  if (x === undefined || y === undefined) {
    return { kind: "error", message: `Usage: ${type} <x> <y>` };
  }
  return { kind: "action", action: { type, x, y } };
}

/**
 * Turns one line of REPL input into a command.
 */
export function parseCommand(line: string): ParsedCommand {
  const input = line.trim();
  if (!input) return { kind: "empty" };

  const space = input.indexOf(" ");
  const name = (space === -1 ? input : input.slice(0, space)).toLowerCase();
  const rest = space === -1 ? "" : input.slice(space + 1).trim();
  const args = rest ? rest.split(/\s+/) : [];

  switch (name) {
    case "quit":
    case "exit":
      return { kind: "quit" };
    case "help":
      return { kind: "help" };
    case "observe":
      return { kind: "observe" };
    case "list_elements":
      return { kind: "list_elements" };
    case "clear_elements":
      return { kind: "clear_elements" };
    case "goal":
      return rest ? { kind: "goal", goal: rest } : { kind: "error", message: "Usage: goal <your goal>" };
    case "smart_click":
      return rest ? { kind: "smart_click", element: rest } : { kind: "error", message: "Usage: smart_click <element>" };
    case "click":
    case "double_click":
    case "right_click":
    case "move":
      return point(name, args);
    case "type": {
      // Text is kept verbatim, inner spacing included
      const text = space === -1 ? "" : input.slice(space + 1);
      return text ? { kind: "action", action: { type: "type", text } } : { kind: "error", message: "Usage: type <text>" };
    }
    case "press":
      return args.length === 1
        ? { kind: "action", action: { type: "press_key", key: args[0] } }
        : { kind: "error", message: "Usage: press <key>" };
    case "hotkey": {
      const keys = rest.split(/[+\s]+/).filter(Boolean);
      return keys.length > 0
        ? { kind: "action", action: { type: "hotkey", keys } }
        : { kind: "error", message: "Usage: hotkey <k1+k2>" };
    }
    case "scroll": {
      const clicks = toInt(args[0]);
      return clicks === undefined
        ? { kind: "error", message: "Usage: scroll <amount>" }
        : { kind: "action", action: { type: "scroll", clicks } };
    }
    case "wait": {
      const seconds = toNumber(args[0]);
      return seconds === undefined || seconds < 0
        ? { kind: "error", message: "Usage: wait <seconds>" }
        : { kind: "action", action: { type: "wait", seconds } };
    }
    default:
      return { kind: "error", message: `Unknown command: ${input}` };
  }
}
