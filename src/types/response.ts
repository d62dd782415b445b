import type { RunResult } from "./run.js";

/** Error categories attached to failed commands and tool responses. */
export type ErrorCategory =
  | "privilege"
  | "not_found"
  | "dependency"
  | "lock"
  | "network"
  | "validation"
  | "state";

/** Base fields present in every MCP tool response. */
export interface ResponseBase {
  status: "success" | "error" | "confirmation_required";
  tool: string;
  target_host: string;
  duration_ms: number | null;
}

export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  run?: RunResult;
  summary?: string;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  remediation: string[];
  run?: RunResult;
}

/** Returned instead of running when a destructive or restoring run needs an explicit go-ahead. */
export interface ConfirmationResponse extends ResponseBase {
  status: "confirmation_required";
  preview: {
    profile: string;
    mode: string;
    description: string;
    warnings: string[];
    actions: string[];
  };
}

export type ToolResponse = SuccessResponse | ErrorResponse | ConfirmationResponse;
