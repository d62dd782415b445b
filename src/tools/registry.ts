import type { RegisteredTool } from "../types/tool.js";
import { Registry } from "../registry.js";

/** MCP tools by name; the server registers each one with the SDK at startup. */
export class ToolRegistry extends Registry<RegisteredTool> {
  constructor() {
    super("tool", (tool) => tool.metadata.name);
  }
}
