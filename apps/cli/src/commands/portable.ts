import { existsSync } from "node:fs";
import { resolve } from "node:path";
import {
  PortableError,
  parsePlatformId,
  isCondaSubdir,
  loadEnvironment,
  loadRuleTable,
  transformEnvironment,
  portableOutputPath,
  writeEnvironment,
  buildLockArgs,
  runCondaLock,
  errorMessage,
} from "@conda-portable/core";
import type { CommandRunner } from "@conda-portable/core";
import {
  PLATFORM_IDS,
  CONDA_SUBDIRS,
  DEFAULT_TARGET_PLATFORMS,
  DEFAULT_SOLVER_COMMAND,
  SOLVER_INSTALL_HINT,
} from "@conda-portable/shared";
import { loadConfig, ConfigError } from "../utils/config.js";
import {
  isJsonMode,
  outputResult,
  outputError,
  logStage,
  logInfo,
  logSuccess,
  EXIT,
} from "../utils/output.js";
import type { ExitCode } from "../utils/output.js";

export interface PortableCommandOptions {
  env: string;
  from_platform: string;
  rules?: string[];
  target?: string[];
  openblas?: boolean;
  /** false when --no-mamba is given */
  mamba?: boolean;
  /** false when --no-lock is given */
  lock?: boolean;
}

export interface PortableCommandDeps {
  runner?: CommandRunner;
  configPath?: string;
}

const FAILURES: Record<string, { exitCode: ExitCode; hints: string[] }> = {
  FORMAT_INVALID: { exitCode: EXIT.INPUT_INVALID, hints: [] },
  UNKNOWN_PLATFORM: {
    exitCode: EXIT.INPUT_INVALID,
    hints: [`Valid platforms: ${PLATFORM_IDS.join(", ")}`],
  },
  RULES_INVALID: { exitCode: EXIT.CONFIG_INVALID, hints: [] },
  WRITE_FAILED: { exitCode: EXIT.WRITE_FAILED, hints: [] },
  SOLVER_NOT_FOUND: { exitCode: EXIT.DEPENDENCY_MISSING, hints: [SOLVER_INSTALL_HINT] },
  SOLVER_FAILED: { exitCode: EXIT.SOLVER_FAILED, hints: [] },
};

function reportFailure(err: unknown): void {
  if (err instanceof PortableError) {
    const failure = FAILURES[err.code] ?? { exitCode: EXIT.GENERAL, hints: [] };
    outputError(err.code, err.message, { exitCode: failure.exitCode, stage: err.stage, hints: failure.hints });
  } else if (err instanceof ConfigError) {
    outputError("CONFIG_INVALID", err.message, { exitCode: EXIT.CONFIG_INVALID, stage: "config" });
  } else {
    outputError("GENERAL", errorMessage(err), { exitCode: EXIT.GENERAL });
  }
}

/**
 * Load → transform → write → lock. Each stage failure is reported and ends the run.
 */
export async function portableCommand(
  options: PortableCommandOptions,
  deps: PortableCommandDeps = {},
): Promise<void> {
  try {
    runPortable(options, deps);
  } catch (err) {
    reportFailure(err);
  }
}

function runPortable(options: PortableCommandOptions, deps: PortableCommandDeps): void {
  const platform = parsePlatformId(options.from_platform);
  const config = loadConfig(deps.configPath);

  const targets = options.target ?? config.targets ?? [...DEFAULT_TARGET_PLATFORMS];
  const badTargets = targets.filter((t) => !isCondaSubdir(t));
  if (badTargets.length > 0) {
    outputError("INPUT_INVALID", `Invalid target platform: ${badTargets.join(", ")}`, {
      exitCode: EXIT.INPUT_INVALID,
      hints: [`Valid targets: ${CONDA_SUBDIRS.join(", ")}`],
    });
    return;
  }

  const inputPath = resolve(options.env);
  if (!existsSync(inputPath)) {
    outputError("FILE_NOT_FOUND", `${options.env} not found`, {
      exitCode: EXIT.INPUT_INVALID,
      stage: "load",
    });
    return;
  }

  logStage("Making environment portable");

  const doc = loadEnvironment(inputPath);
  const rules = loadRuleTable([...(config.rules ?? []), ...(options.rules ?? [])]);
  const result = transformEnvironment(doc, platform, rules, { openblas: options.openblas ?? false });

  const outPath = portableOutputPath(inputPath);
  writeEnvironment(result.document, outPath, { inputPath });

  for (const spec of result.dropped) {
    logInfo(`  - dropped ${spec}`);
  }
  for (const req of result.marked) {
    logInfo(`  ~ marked  ${req}`);
  }
  for (const key of result.strippedKeys) {
    logInfo(`  - removed top-level '${key}'`);
  }
  logSuccess(`Wrote ${outPath} (from ${platform})`);

  const locked = options.lock !== false;
  if (locked) {
    const command = config.solver_command ?? DEFAULT_SOLVER_COMMAND;
    const mamba = options.mamba === false ? false : (config.mamba ?? true);

    logStage(`Verifying portable environment with ${command}`);
    logInfo(`+ ${[command, ...buildLockArgs(outPath, targets, mamba)].join(" ")}`);

    runCondaLock(outPath, {
      targets,
      command,
      mamba,
      stdoutToStderr: isJsonMode(),
      runner: deps.runner,
    });
    logSuccess(`${command} finished for ${targets.join(", ")}`);
  } else {
    logInfo("Skipped conda-lock (--no-lock).");
  }

  if (isJsonMode()) {
    outputResult({
      input: inputPath,
      output: outPath,
      from_platform: platform,
      dropped: result.dropped,
      marked: result.marked,
      stripped_keys: result.strippedKeys,
      locked,
      targets: locked ? targets : [],
    });
  }
}
