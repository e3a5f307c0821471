/**
 * Environment module — in-memory model of a conda environment.yml.
 */

/** A conda match spec, e.g. `python=3.12` or `conda-forge::numpy`. */
export interface PlainSpec {
  kind: "spec";
  spec: string;
}

/** The `- pip: [...]` sub-list. */
export interface PipBlock {
  kind: "pip";
  requirements: readonly string[];
}

/** Any other dependency shape; written back untouched. */
export interface OpaqueEntry {
  kind: "opaque";
  value: unknown;
}

export type DependencyEntry = PlainSpec | PipBlock | OpaqueEntry;

export interface EnvironmentDocument {
  name?: string;
  channels?: readonly string[];
  dependencies: readonly DependencyEntry[];
  /** Top-level keys other than name, channels and dependencies. */
  extras: Readonly<Record<string, unknown>>;
  /** Top-level key order as read. */
  keyOrder: readonly string[];
  /**
   * Source text of every top-level entry except `dependencies`, from the key
   * through its value. The writer emits these unchanged.
   */
  verbatim: Readonly<Record<string, string>>;
}

export { parseEnvironment, loadEnvironment, toDependencyEntry } from "./load.js";
export { serializeEnvironment, writeEnvironment, portableOutputPath } from "./write.js";
