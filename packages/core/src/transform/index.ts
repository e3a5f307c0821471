/**
 * Transform module — turns an exported environment into a portable one.
 */

import { MACHINE_SPECIFIC_KEYS } from "@conda-portable/shared";
import type { PlatformId } from "@conda-portable/shared";
import type { DependencyEntry, EnvironmentDocument } from "../environment/index.js";
import type { RuleTable } from "../rules/table.js";
import { isPlatformLocked } from "./spec-name.js";
import { withPlatformMarker, hasMarker } from "./marker.js";
import { pinOpenBlas } from "./openblas.js";

export interface TransformOptions {
  /** Replace MKL with OpenBLAS. */
  openblas?: boolean;
}

export interface TransformResult {
  document: EnvironmentDocument;
  /** Conda specs removed, in input order. */
  dropped: string[];
  /** Pip requirements that received a platform marker, as written. */
  marked: string[];
  /** Machine-specific top-level keys removed. */
  strippedKeys: string[];
}

const MACHINE_KEYS = new Set<string>(MACHINE_SPECIFIC_KEYS);

/**
 * Apply the rule table for `origin` to `doc`. The input is not mutated.
 */
export function transformEnvironment(
  doc: EnvironmentDocument,
  origin: PlatformId,
  rules: RuleTable,
  options: TransformOptions = {},
): TransformResult {
  const excluded = rules.lookup(origin);
  const dropped: string[] = [];
  const marked: string[] = [];

  let dependencies: DependencyEntry[] = [];
  for (const entry of doc.dependencies) {
    switch (entry.kind) {
      case "spec":
        if (isPlatformLocked(entry.spec, excluded)) {
          dropped.push(entry.spec);
        } else {
          dependencies.push({ kind: "spec", spec: entry.spec });
        }
        break;
      case "pip":
        dependencies.push({
          kind: "pip",
          requirements: entry.requirements.map((req) => {
            if (!isPlatformLocked(req, excluded) || hasMarker(req)) return req;
            const tagged = withPlatformMarker(req, origin);
            marked.push(tagged);
            return tagged;
          }),
        });
        break;
      case "opaque":
        dependencies.push({ kind: "opaque", value: structuredClone(entry.value) });
        break;
    }
  }

  if (options.openblas) {
    const pinned = pinOpenBlas(dependencies);
    dependencies = pinned.entries;
    dropped.push(...pinned.dropped);
  }

  const extras: Record<string, unknown> = {};
  const strippedKeys: string[] = [];
  for (const [key, value] of Object.entries(doc.extras)) {
    if (MACHINE_KEYS.has(key)) {
      strippedKeys.push(key);
    } else {
      extras[key] = structuredClone(value);
    }
  }

  const verbatim: Record<string, string> = {};
  for (const [key, source] of Object.entries(doc.verbatim)) {
    if (!MACHINE_KEYS.has(key)) verbatim[key] = source;
  }

  const document: EnvironmentDocument = {
    ...(doc.name !== undefined ? { name: doc.name } : {}),
    ...(doc.channels !== undefined ? { channels: [...doc.channels] } : {}),
    dependencies,
    extras,
    keyOrder: doc.keyOrder.filter((key) => !MACHINE_KEYS.has(key)),
    verbatim,
  };

  return { document, dropped, marked, strippedKeys };
}

export { baseName, isPlatformLocked } from "./spec-name.js";
export { markerClause, hasMarker, withPlatformMarker } from "./marker.js";
export { pinOpenBlas } from "./openblas.js";
