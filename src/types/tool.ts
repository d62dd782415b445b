import type { z } from "zod";
import type { ToolResponse } from "./response.js";

/** Metadata declared by every MCP tool at registration time. */
export interface ToolMetadata {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.AnyZodObject;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

/** A registered tool with its execute function. */
export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: Record<string, unknown>) => Promise<ToolResponse>;
}
