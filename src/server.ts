#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { hostname } from "node:os";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { createProfileDeps, createProfileRegistry } from "./profiles/index.js";
import { assertPrivilege } from "./system/privilege.js";
import { ToolRegistry } from "./tools/registry.js";
import { registerHardeningTools } from "./tools/hardening/index.js";
import { fromError } from "./tools/helpers.js";
import type { ToolContext } from "./tools/context.js";
import type { ToolResponse } from "./types/response.js";

async function main(): Promise<void> {
  logger.info("Starting host-hardening MCP server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.HOST_HARDENING_CONFIG ?? undefined);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Verify privilege ─────────────────────────────────
  assertPrivilege(config);

  // ── Phase 3: Create executor and profiles ─────────────────────
  const profiles = createProfileRegistry(createProfileDeps(config, new LocalExecutor()));

  // ── Phase 4: Create tool registry and context ─────────────────
  const registry = new ToolRegistry();
  const ctx: ToolContext = { config, profiles, registry, targetHost: hostname(), configPath, firstRun };
  registerHardeningTools(ctx);
  logger.info({ tools: registry.ids(), profiles: profiles.ids() }, "Tools registered");

  // ── Phase 5: Create MCP server and register tools ─────────────
  const server = new McpServer({ name: "host-hardening", version: "0.1.0" });

  for (const tool of registry.getAll()) {
    const meta = tool.metadata;
    const name = meta.name;
    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: meta.inputSchema.shape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? false,
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        let response: ToolResponse;
        try {
          response = await tool.execute(args);
        } catch (err) {
          logger.error({ tool: name, error: err }, "Tool execution error");
          response = fromError(name, ctx.targetHost, 0, err);
        }
        return { content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }] };
      },
    );
  }

  // ── Phase 6: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.ids().length, host: ctx.targetHost }, "host-hardening MCP server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
