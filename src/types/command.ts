/**
 * A structured command ready for execution.
 * Collaborators never build raw shell strings; they produce Command objects.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}
