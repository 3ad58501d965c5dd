import { ScreenSize } from "../types.js";

export const DESCRIBE_SCREEN_PROMPT = `
Describe what you see on this screen in detail.
Include:
- Main elements and UI components
- Text content visible
- Interactive elements (buttons, links, forms)
- Current state of the application/window
- Any notable features or areas of interest
`.trim();

export function suggestActionPrompt(goal: string): string {
  return `
Goal: ${goal}

Analyze this screenshot and suggest the next action to take.
Provide a specific action in this format:
ACTION: [click/type/scroll/move/wait]
TARGET: [description of where to click or what to type]
REASON: [why this action helps achieve the goal]

Be specific about coordinates or text to type.
`.trim();
}

/**
 * Asks for a percentage bounding box in the line format the coordinate
 * parser reads.
 */
export function locateElementPrompt(description: string, screen: ScreenSize): string {
  return `
Find the "${description}" on this screen.

Screen size: ${screen.width}x${screen.height} pixels

Provide LEFT, TOP, WIDTH, HEIGHT as percentages (0-100) from the top-left corner (0,0),
and CONFIDENCE as low/medium/high, in the exact key: value line format:
- LEFT: percentage from left edge (0-100)
- TOP: percentage from top edge (0-100)
- WIDTH: percentage of screen width (0-100)
- HEIGHT: percentage of screen height (0-100)

Format your response EXACTLY like this:
ELEMENT: [name of the element]
LEFT: [number]
TOP: [number]
WIDTH: [number]
HEIGHT: [number]
CONFIDENCE: [low/medium/high]

Be as precise as possible.
`.trim();
}
