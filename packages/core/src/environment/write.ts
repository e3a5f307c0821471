import { openSync, writeSync, fsyncSync, closeSync, renameSync, rmSync } from "node:fs";
import { randomUUID } from "node:crypto";
import { basename, dirname, extname, join, resolve } from "node:path";
import { stringify } from "yaml";
import { PORTABLE_SUFFIX } from "@conda-portable/shared";
import { WriteError, errorMessage } from "../errors.js";
import type { DependencyEntry, EnvironmentDocument } from "./index.js";

function fromDependencyEntry(entry: DependencyEntry): unknown {
  switch (entry.kind) {
    case "spec":
      return entry.spec;
    case "pip":
      return { pip: [...entry.requirements] };
    case "opaque":
      return entry.value;
  }
}

function modelledValue(doc: EnvironmentDocument, key: string): unknown {
  if (key === "name") return doc.name;
  if (key === "channels") return doc.channels ? [...doc.channels] : undefined;
  if (key === "dependencies") return doc.dependencies.map(fromDependencyEntry);
  return doc.extras[key];
}

function topLevelKeys(doc: EnvironmentDocument): string[] {
  const keys = [...doc.keyOrder];
  for (const key of ["name", "channels", "dependencies", ...Object.keys(doc.extras)]) {
    if (!keys.includes(key)) keys.push(key);
  }
  return keys;
}

/**
 * Only `dependencies`, and entries without source text, are re-serialized;
 * everything else is written exactly as it was read.
 */
export function serializeEnvironment(doc: EnvironmentDocument): string {
  const parts: string[] = [];
  for (const key of topLevelKeys(doc)) {
    const source = key === "dependencies" ? undefined : doc.verbatim[key];
    if (source !== undefined) {
      parts.push(source);
      continue;
    }
    const value = modelledValue(doc, key);
    if (value !== undefined) parts.push(stringify({ [key]: value }).trimEnd());
  }
  return parts.join("\n") + "\n";
}

/**
 * environment.yml → environment.portable.yml, in the same directory.
 */
export function portableOutputPath(inputPath: string): string {
  const ext = extname(inputPath);
  const stem = basename(inputPath, ext);
  return join(dirname(inputPath), `${stem}${PORTABLE_SUFFIX}${ext || ".yml"}`);
}

/**
 * Write the document to `outPath` through a temporary sibling file and a rename,
 * so the target either holds the complete document or is left untouched.
 */
export function writeEnvironment(
  doc: EnvironmentDocument,
  outPath: string,
  options: { inputPath?: string } = {},
): void {
  if (options.inputPath && resolve(options.inputPath) === resolve(outPath)) {
    throw new WriteError(`Refusing to overwrite the input file ${outPath}`);
  }

  const text = serializeEnvironment(doc);
  const tmpPath = join(dirname(outPath), `.${basename(outPath)}.${randomUUID()}.tmp`);

  try {
    const fd = openSync(tmpPath, "wx");
    try {
      writeSync(fd, text, null, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, outPath);
  } catch (err) {
    rmSync(tmpPath, { force: true });
    throw new WriteError(`Cannot write ${outPath}: ${errorMessage(err)}`, { cause: err });
  }
}
