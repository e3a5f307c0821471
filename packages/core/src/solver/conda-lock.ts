/**
 * conda-lock invocation. The solver's resolution and output are opaque here;
 * only its exit status is interpreted.
 */

import { spawnSync } from "node:child_process";
import type { StdioOptions } from "node:child_process";
import { DEFAULT_SOLVER_COMMAND, DEFAULT_TARGET_PLATFORMS, SOLVER_INSTALL_HINT } from "@conda-portable/shared";
import { SolverError } from "../errors.js";

export interface CommandOutcome {
  status: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all (e.g. ENOENT). */
  error?: Error;
}

export interface RunOptions {
  /** Discard output instead of forwarding it. */
  quiet?: boolean;
  /** Forward the child's stdout to our stderr (keeps --json stdout clean). */
  stdoutToStderr?: boolean;
}

export type CommandRunner = (command: string, args: readonly string[], options: RunOptions) => CommandOutcome;

export const spawnRunner: CommandRunner = (command, args, options) => {
  let stdio: StdioOptions = "inherit";
  if (options.quiet) stdio = "ignore";
  else if (options.stdoutToStderr) stdio = ["inherit", 2, "inherit"];

  const result = spawnSync(command, [...args], { stdio });
  return { status: result.status, signal: result.signal, error: result.error };
};

export interface CondaLockOptions {
  targets?: readonly string[];
  command?: string;
  /** Pass --mamba (default true). */
  mamba?: boolean;
  stdoutToStderr?: boolean;
  runner?: CommandRunner;
}

export function buildLockArgs(
  envPath: string,
  targets: readonly string[] = DEFAULT_TARGET_PLATFORMS,
  mamba = true,
): string[] {
  const args = ["lock"];
  if (mamba) args.push("--mamba");
  args.push("--file", envPath);
  for (const target of targets) {
    args.push("--platform", target);
  }
  return args;
}

/**
 * Check that the solver can be started.
 */
export function solverAvailable(command: string, runner: CommandRunner = spawnRunner): boolean {
  const outcome = runner(command, ["--version"], { quiet: true });
  return !outcome.error && outcome.status === 0;
}

/**
 * Run `conda-lock lock` for `envPath` and wait for it. Throws SolverError when
 * the solver is missing or exits unsuccessfully; never retries.
 */
export function runCondaLock(envPath: string, options: CondaLockOptions = {}): string[] {
  const {
    targets = DEFAULT_TARGET_PLATFORMS,
    command = DEFAULT_SOLVER_COMMAND,
    mamba = true,
    stdoutToStderr = false,
    runner = spawnRunner,
  } = options;

  if (!solverAvailable(command, runner)) {
    throw new SolverError("SOLVER_NOT_FOUND", `${command} not found. ${SOLVER_INSTALL_HINT}`);
  }

  const args = buildLockArgs(envPath, targets, mamba);
  const outcome = runner(command, args, { stdoutToStderr });

  if (outcome.error) {
    throw new SolverError("SOLVER_FAILED", `${command} could not be started: ${outcome.error.message}`, {
      cause: outcome.error,
    });
  }
  if (outcome.status !== 0) {
    const reason = outcome.signal ? `was terminated by ${outcome.signal}` : `exited with status ${outcome.status}`;
    throw new SolverError("SOLVER_FAILED", `${command} ${reason}`, { status: outcome.status });
  }
  return [command, ...args];
}
