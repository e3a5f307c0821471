import chalk from "chalk";

// Exit codes — one per failing stage so scripts can branch on them
export const EXIT = {
  SUCCESS: 0,
  GENERAL: 1,
  INPUT_INVALID: 2,
  CONFIG_INVALID: 3,
  WRITE_FAILED: 4,
  DEPENDENCY_MISSING: 20,
  SOLVER_FAILED: 21,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const SCHEMA_VERSION = 1;

// --json detection (global flag)
export function isJsonMode(): boolean {
  return process.argv.includes("--json");
}

// Structured success result → stdout
export function outputResult(data: Record<string, unknown>): void {
  const envelope = { schema_version: SCHEMA_VERSION, ok: true, data };
  process.stdout.write(JSON.stringify(envelope, null, 2) + "\n");
}

// Structured error → stdout (JSON mode) / stderr (normal)
export function outputError(
  code: string,
  message: string,
  opts: {
    exitCode?: ExitCode;
    stage?: string;
    hints?: string[];
  } = {},
): void {
  const { exitCode = EXIT.GENERAL, stage, hints = [] } = opts;
  process.exitCode = exitCode;

  if (isJsonMode()) {
    const envelope = {
      schema_version: SCHEMA_VERSION,
      ok: false,
      error: { code, stage: stage ?? null, message, hints },
    };
    process.stdout.write(JSON.stringify(envelope, null, 2) + "\n");
  } else {
    const prefix = stage ? `ERROR [${stage}]` : "ERROR";
    console.error(chalk.red(`${prefix}: ${message}`));
    for (const hint of hints) {
      console.error(chalk.dim(`  ${hint}`));
    }
  }
}

// Progress/info/success → stderr (suppressed in JSON mode to keep stdout clean)
export function logProgress(msg: string): void {
  if (!isJsonMode()) process.stderr.write(msg + "\n");
}

export function logInfo(msg: string): void {
  if (!isJsonMode()) process.stderr.write(chalk.dim(msg) + "\n");
}

export function logSuccess(msg: string): void {
  if (!isJsonMode()) process.stderr.write(chalk.green(msg) + "\n");
}

/** Stage heading, framed so it stands out from solver output. */
export function logStage(msg: string): void {
  const border = "*".repeat(msg.length + 4);
  logProgress(chalk.bold(`${border}\n* ${msg} *\n${border}`));
}
