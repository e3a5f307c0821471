// Errors
export {
  PortableError,
  FormatError,
  UnknownPlatformError,
  RuleTableError,
  WriteError,
  SolverError,
  errorMessage,
} from "./errors.js";
export type { PortableStage } from "./errors.js";

// Platforms
export { isPlatformId, parsePlatformId, markerPlatformName, isCondaSubdir } from "./platform.js";

// Environment
export {
  parseEnvironment,
  loadEnvironment,
  toDependencyEntry,
  serializeEnvironment,
  writeEnvironment,
  portableOutputPath,
} from "./environment/index.js";
export type {
  EnvironmentDocument,
  DependencyEntry,
  PlainSpec,
  PipBlock,
  OpaqueEntry,
} from "./environment/index.js";

// Rules
export {
  RuleTable,
  RuleFileSchema,
  loadRuleTable,
  readRuleFile,
  parseRuleFile,
  bundledRulesPath,
} from "./rules/table.js";
export type { RuleFile } from "./rules/table.js";

// Transform
export {
  transformEnvironment,
  baseName,
  isPlatformLocked,
  markerClause,
  hasMarker,
  withPlatformMarker,
  pinOpenBlas,
} from "./transform/index.js";
export type { TransformOptions, TransformResult } from "./transform/index.js";

// Solver
export { runCondaLock, buildLockArgs, solverAvailable, spawnRunner } from "./solver/conda-lock.js";
export type { CommandRunner, CommandOutcome, RunOptions, CondaLockOptions } from "./solver/conda-lock.js";
