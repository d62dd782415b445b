import type { ToolContext } from "./context.js";
import type { ConfirmationResponse, ErrorCategory, ErrorResponse, SuccessResponse, ToolResponse } from "../types/response.js";
import type { ToolMetadata } from "../types/tool.js";
import type { RunResult } from "../types/run.js";
import { HardeningErrorCode, errorMessage, isHardeningError } from "../errors.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, targetHost: string, durationMs: number | null, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, data, ...extra };
}

export function error(tool: string, targetHost: string, durationMs: number | null, opts: { code: string; category: ErrorCategory; message: string; remediation?: string[]; run?: RunResult }): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    remediation: opts.remediation ?? [],
    ...(opts.run ? { run: opts.run } : {}),
  };
}

export function confirmation(tool: string, targetHost: string, preview: ConfirmationResponse["preview"]): ConfirmationResponse {
  return { status: "confirmation_required", tool, target_host: targetHost, duration_ms: null, preview };
}

// ── Error Mapping ──────────────────────────────────────────────────

const CODE_CATEGORIES: Record<HardeningErrorCode, ErrorCategory> = {
  [HardeningErrorCode.OBSERVATION_FAILED]: "state",
  [HardeningErrorCode.ACTION_FAILED]: "state",
  [HardeningErrorCode.PREREQUISITE_MISSING]: "dependency",
  [HardeningErrorCode.VALIDATION_FAILED]: "validation",
  [HardeningErrorCode.CONFIG_INVALID]: "validation",
  [HardeningErrorCode.PROFILE_NOT_FOUND]: "not_found",
  [HardeningErrorCode.BACKOUT_UNSUPPORTED]: "validation",
  [HardeningErrorCode.NOT_ROOT]: "privilege",
};

const CODE_REMEDIATION: Partial<Record<HardeningErrorCode, string[]>> = {
  [HardeningErrorCode.PROFILE_NOT_FOUND]: ["Run harden_profiles to list available profiles"],
  [HardeningErrorCode.BACKOUT_UNSUPPORTED]: ["Only profiles reporting supports_backout: true can be backed out"],
  [HardeningErrorCode.NOT_ROOT]: ["Start the server as root, or set privilege.require_root: false"],
};

/** Turn anything a handler throws into an error response. */
export function fromError(tool: string, targetHost: string, durationMs: number | null, err: unknown): ErrorResponse {
  if (isHardeningError(err)) {
    return error(tool, targetHost, durationMs, {
      code: err.code, category: CODE_CATEGORIES[err.code], message: err.message,
      remediation: CODE_REMEDIATION[err.code],
    });
  }
  return error(tool, targetHost, durationMs, {
    code: "INTERNAL_ERROR", category: "state", message: errorMessage(err),
    remediation: ["Check server logs for details"],
  });
}

// ── Tool Registration Helper ───────────────────────────────────────

/** Register a tool on the context's registry with less boilerplate. */
export function registerTool(
  ctx: ToolContext,
  metadata: ToolMetadata,
  handler: (args: Record<string, unknown>) => Promise<ToolResponse>,
): void {
  ctx.registry.register({ metadata, execute: handler });
}
