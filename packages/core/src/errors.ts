/**
 * Typed failures, one per pipeline stage. The CLI maps `code` to an exit code.
 */

export type PortableStage = "load" | "platform" | "rules" | "write" | "solve";

export class PortableError extends Error {
  readonly code: string;
  readonly stage: PortableStage;

  constructor(code: string, stage: PortableStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.stage = stage;
  }
}

/** Input document is unreadable, not YAML, or lacks the required structure. */
export class FormatError extends PortableError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FORMAT_INVALID", "load", message, options);
  }
}

export class UnknownPlatformError extends PortableError {
  readonly platform: string;

  constructor(platform: string) {
    super("UNKNOWN_PLATFORM", "platform", `Unknown platform: ${platform}`);
    this.platform = platform;
  }
}

export class RuleTableError extends PortableError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RULES_INVALID", "rules", message, options);
  }
}

export class WriteError extends PortableError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("WRITE_FAILED", "write", message, options);
  }
}

export class SolverError extends PortableError {
  /** Exit status of the solver process, when it ran at all. */
  readonly status: number | null;

  constructor(
    code: "SOLVER_NOT_FOUND" | "SOLVER_FAILED",
    message: string,
    options?: { cause?: unknown; status?: number | null },
  ) {
    super(code, "solve", message, options);
    this.status = options?.status ?? null;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
