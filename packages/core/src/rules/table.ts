/**
 * Rule table — known platform-locked package names per origin platform.
 *
 * The bundled table ships as data/platform-packages.yaml so it can grow
 * without code changes. Extra rule files are merged into it by set union.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { z } from "zod";
import { PLATFORM_IDS } from "@conda-portable/shared";
import type { PlatformId } from "@conda-portable/shared";
import { RuleTableError, errorMessage } from "../errors.js";

export const RuleFileSchema = z.record(z.enum(PLATFORM_IDS), z.array(z.string()).nullable());

export type RuleFile = z.infer<typeof RuleFileSchema>;

type RuleRecord = Readonly<Partial<Record<PlatformId, readonly string[] | null>>>;

const EMPTY: ReadonlySet<string> = new Set();
const KNOWN_PLATFORMS = new Set<string>(PLATFORM_IDS);

export function bundledRulesPath(): string {
  return fileURLToPath(new URL("../../data/platform-packages.yaml", import.meta.url));
}

export class RuleTable {
  private readonly entries: ReadonlyMap<string, ReadonlySet<string>>;

  private constructor(entries: Map<string, Set<string>>) {
    this.entries = entries;
  }

  static fromRecord(record: RuleRecord): RuleTable {
    return RuleTable.merge([record]);
  }

  static merge(records: readonly RuleRecord[]): RuleTable {
    const entries = new Map<string, Set<string>>();
    for (const record of records) {
      for (const [platform, names] of Object.entries(record)) {
        const set = entries.get(platform) ?? new Set<string>();
        for (const name of names ?? []) {
          const normalized = name.trim().toLowerCase();
          if (normalized) set.add(normalized);
        }
        entries.set(platform, set);
      }
    }
    return new RuleTable(entries);
  }

  /** Known platform-locked names for `platform`; empty when the table has none. */
  lookup(platform: PlatformId): ReadonlySet<string> {
    return this.entries.get(platform) ?? EMPTY;
  }

  platforms(): string[] {
    return [...this.entries.keys()];
  }
}

export function parseRuleFile(text: string, source: string): RuleFile {
  let data: unknown;
  try {
    data = parse(text);
  } catch (err) {
    throw new RuleTableError(`Rule file ${source} is not valid YAML: ${errorMessage(err)}`, { cause: err });
  }
  // An empty file is an empty table
  if (data === null || data === undefined) return {};

  if (typeof data === "object" && !Array.isArray(data)) {
    const unknown = Object.keys(data).filter((key) => !KNOWN_PLATFORMS.has(key));
    if (unknown.length > 0) {
      throw new RuleTableError(
        `Rule file ${source} has unknown platform ${unknown.map((k) => `'${k}'`).join(", ")} (expected ${PLATFORM_IDS.join(", ")})`,
      );
    }
  }

  const result = RuleFileSchema.safeParse(data);
  if (!result.success) {
    throw new RuleTableError(
      `Rule file ${source} must map platform names to lists of package names`,
    );
  }
  return result.data;
}

export function readRuleFile(path: string): RuleFile {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new RuleTableError(`Cannot read rule file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parseRuleFile(text, path);
}

/**
 * Load the bundled table plus any extra rule files, once per run.
 */
export function loadRuleTable(extraPaths: readonly string[] = []): RuleTable {
  const files = [bundledRulesPath(), ...extraPaths].map(readRuleFile);
  return RuleTable.merge(files);
}
