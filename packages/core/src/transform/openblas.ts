import { MKL_PACKAGES, OPENBLAS_SPEC } from "@conda-portable/shared";
import type { DependencyEntry } from "../environment/index.js";
import { baseName } from "./spec-name.js";

const MKL = new Set<string>(MKL_PACKAGES);

function isOpenBlasPin(spec: string): boolean {
  return baseName(spec) === "libblas" && spec.includes("*openblas");
}

/**
 * Drop MKL / OpenMP conda packages and make sure libblas resolves to OpenBLAS,
 * which every target platform provides.
 */
export function pinOpenBlas(entries: readonly DependencyEntry[]): {
  entries: DependencyEntry[];
  dropped: string[];
} {
  const kept: DependencyEntry[] = [];
  const dropped: string[] = [];
  let hasOpenBlas = false;

  for (const entry of entries) {
    if (entry.kind === "spec") {
      if (MKL.has(baseName(entry.spec))) {
        dropped.push(entry.spec);
        continue;
      }
      if (isOpenBlasPin(entry.spec)) hasOpenBlas = true;
    }
    kept.push(entry);
  }

  if (!hasOpenBlas) {
    kept.unshift({ kind: "spec", spec: OPENBLAS_SPEC });
  }
  return { entries: kept, dropped };
}
