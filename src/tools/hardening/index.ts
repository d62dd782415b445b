import { z } from "zod";
import type { ToolContext } from "../context.js";
import type { ToolResponse } from "../../types/response.js";
import type { InteractionFn, RunErrorKind, RunMode, RunResult } from "../../types/run.js";
import type { Action } from "../../types/action.js";
import { registerTool, success, error, confirmation, fromError } from "../helpers.js";
import { runProfile } from "../../profiles/run.js";
import { runSucceeded } from "../../reconciler/reconciler.js";
import { resultLine } from "../../reconciler/report.js";
import { HardeningErrorCode } from "../../errors.js";
import { logger } from "../../logger.js";

// Tool calls never block on a question; every gate that would ask is treated as declined.
const declineAll: InteractionFn = async (question) => {
  logger.debug({ question: question.message }, "Declining interactive question in MCP context");
  return false;
};

const KIND_CODES: Record<RunErrorKind, HardeningErrorCode> = {
  observation: HardeningErrorCode.OBSERVATION_FAILED,
  action: HardeningErrorCode.ACTION_FAILED,
  prerequisite: HardeningErrorCode.PREREQUISITE_MISSING,
  validation: HardeningErrorCode.VALIDATION_FAILED,
};

const profileField = z.string().min(1).describe("Profile id (see harden_profiles), e.g. 'sshd-crypto'");
const confirmedField = z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response.");

const checkSchema = z.object({ profile: profileField });
const applySchema = z.object({
  profile: profileField,
  purge: z.boolean().optional().default(false).describe("Pre-authorize destructive actions such as purging the rpcbind package"),
  confirmed: confirmedField,
});
const backoutSchema = z.object({ profile: profileField, confirmed: confirmedField });

/** Shape a finished run into a tool response. */
export function runResponse(tool: string, ctx: ToolContext, profile: string, result: RunResult, durationMs: number): ToolResponse {
  const summary = resultLine(result);
  const satisfied = result.mode === "check" ? result.satisfiedBefore : result.satisfiedAfter;
  if (result.mode === "check" || runSucceeded(result)) {
    return success(tool, ctx.targetHost, durationMs, {
      profile, mode: result.mode, satisfied, verdict: result.verdictAfter ?? result.verdictBefore,
      applied: result.actionsApplied,
    }, { run: result, summary });
  }
  const first = result.errors.find((e) => e.fatal) ?? result.errors[0];
  return error(tool, ctx.targetHost, durationMs, {
    code: first ? KIND_CODES[first.kind] : "NOT_SATISFIED",
    category: first?.kind === "validation" ? "validation" : "state",
    message: first ? `${summary} ${first.source.name}: ${first.message}` : summary,
    remediation: result.errors.flatMap((e) => e.remediation ?? []),
    run: result,
  });
}

function destructiveWarnings(actions: readonly Action[]): string[] {
  return actions.filter((a) => a.destructive && a.preAuthorized).map((a) => `${a.description} (destructive, cannot be undone by this tool)`);
}

export function registerHardeningTools(ctx: ToolContext): void {
  async function execute(tool: string, profileId: string, mode: RunMode, purge: boolean): Promise<ToolResponse> {
    const start = Date.now();
    try {
      const profile = ctx.profiles.require(profileId);
      const result = await runProfile(profile, mode, { purge }, declineAll);
      return runResponse(tool, ctx, profile.id, result, Date.now() - start);
    } catch (err) {
      logger.error({ tool, profile: profileId, error: err }, "Hardening run failed");
      return fromError(tool, ctx.targetHost, Date.now() - start, err);
    }
  }

  // ── harden_profiles ─────────────────────────────────────────────
  registerTool(ctx, {
    name: "harden_profiles", description: "List the available hardening profiles and whether each supports backout.",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true },
  }, async () => {
    const profiles = ctx.profiles.getAll().map((p) => ({ id: p.id, description: p.description, supports_backout: p.supportsBackout }));
    return success("harden_profiles", ctx.targetHost, 0, { profiles, config_path: ctx.configPath, first_run: ctx.firstRun });
  });

  // ── harden_check ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "harden_check", description: "Observe a profile's facts and report whether the host already matches it. Changes nothing.",
    inputSchema: checkSchema,
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => {
    const input = checkSchema.safeParse(args);
    if (!input.success) return error("harden_check", ctx.targetHost, null, { code: "INVALID_INPUT", category: "validation", message: input.error.message });
    return execute("harden_check", input.data.profile, "check", false);
  });

  // ── harden_apply ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "harden_apply", description: "Apply a profile without prompting, then verify. Destructive steps run only with purge: true and confirmed: true.",
    inputSchema: applySchema,
    annotations: { destructiveHint: true, idempotentHint: true },
  }, async (args) => {
    const input = applySchema.safeParse(args);
    if (!input.success) return error("harden_apply", ctx.targetHost, null, { code: "INVALID_INPUT", category: "validation", message: input.error.message });
    const { profile: profileId, purge, confirmed } = input.data;
    if (purge && !confirmed) {
      const profile = ctx.profiles.get(profileId);
      if (!profile) return execute("harden_apply", profileId, "apply-unattended", purge);
      const plan = profile.plan({ purge });
      const warnings = destructiveWarnings(plan.actions);
      if (warnings.length > 0) {
        return confirmation("harden_apply", ctx.targetHost, {
          profile: profile.id, mode: "apply-unattended", description: profile.description,
          warnings, actions: plan.actions.map((a) => a.name),
        });
      }
    }
    return execute("harden_apply", profileId, "apply-unattended", purge);
  });

  // ── harden_backout ──────────────────────────────────────────────
  registerTool(ctx, {
    name: "harden_backout", description: "Restore the pre-hardening state of a profile that supports backout. Always requires confirmation.",
    inputSchema: backoutSchema,
    annotations: { destructiveHint: true },
  }, async (args) => {
    const input = backoutSchema.safeParse(args);
    if (!input.success) return error("harden_backout", ctx.targetHost, null, { code: "INVALID_INPUT", category: "validation", message: input.error.message });
    const { profile: profileId, confirmed } = input.data;
    if (!confirmed) {
      const profile = ctx.profiles.get(profileId);
      const restore = profile?.supportsBackout ? profile.plan({ purge: false }).restore : undefined;
      if (profile && restore) {
        return confirmation("harden_backout", ctx.targetHost, {
          profile: profile.id, mode: "backout", description: `Restore ${restore.target.name}`,
          warnings: [`Reverses the ${profile.id} hardening on ${ctx.targetHost}`],
          actions: restore.actions.map((a) => a.name),
        });
      }
    }
    return execute("harden_backout", profileId, "backout", false);
  });
}
