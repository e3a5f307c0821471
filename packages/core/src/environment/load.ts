import { readFileSync } from "node:fs";
import { parseDocument, isMap, isNode, isScalar } from "yaml";
import type { ZodIssue } from "zod";
import { FormatError, errorMessage } from "../errors.js";
import { PipBlockSchema, RawEnvironmentSchema } from "./schema.js";
import type { DependencyEntry, EnvironmentDocument } from "./index.js";

const MODELLED_KEYS = new Set(["name", "channels", "dependencies"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return `${path}${issue.message}`;
}

export function toDependencyEntry(value: unknown): DependencyEntry {
  if (typeof value === "string") {
    return { kind: "spec", spec: value };
  }
  const pip = PipBlockSchema.safeParse(value);
  if (pip.success) {
    return { kind: "pip", requirements: pip.data.pip };
  }
  return { kind: "opaque", value };
}

/**
 * Source text of each top-level entry, from the key through the end of its
 * value. Entries are written back from this text so their scalars keep the
 * exact form they were exported with (`3.10` stays `3.10`).
 */
function topLevelSources(text: string, doc: ReturnType<typeof parseDocument>): Record<string, string> {
  const sources: Record<string, string> = {};
  if (!isMap(doc.contents)) return sources;

  for (const pair of doc.contents.items) {
    if (!isScalar(pair.key) || !pair.key.range) continue;
    const end = isNode(pair.value) && pair.value.range ? pair.value.range[1] : pair.key.range[1];
    sources[String(pair.key.value)] = text.slice(pair.key.range[0], end).trimEnd();
  }
  return sources;
}

/**
 * Parse environment.yml text into an EnvironmentDocument.
 * Throws FormatError for malformed YAML or a document without `dependencies`.
 */
export function parseEnvironment(text: string, source = "environment file"): EnvironmentDocument {
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    throw new FormatError(`${source} is not valid YAML: ${doc.errors[0].message}`, { cause: doc.errors[0] });
  }
  const data: unknown = doc.toJS();

  if (!isRecord(data)) {
    throw new FormatError(`${source} must be a YAML mapping`);
  }
  if (!("dependencies" in data)) {
    throw new FormatError(`no 'dependencies' in ${source}`);
  }

  const result = RawEnvironmentSchema.safeParse(data);
  if (!result.success) {
    throw new FormatError(`${source} is malformed: ${result.error.issues.map(formatIssue).join("; ")}`);
  }

  const raw = result.data;
  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!MODELLED_KEYS.has(key)) extras[key] = value;
  }

  // dependencies is the one entry the writer regenerates
  const verbatim = topLevelSources(text, doc);
  delete verbatim.dependencies;

  return {
    ...(raw.name !== undefined ? { name: raw.name } : {}),
    ...(raw.channels !== undefined ? { channels: raw.channels } : {}),
    dependencies: raw.dependencies.map(toDependencyEntry),
    extras,
    keyOrder: Object.keys(data),
    verbatim,
  };
}

export function loadEnvironment(path: string): EnvironmentDocument {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new FormatError(`Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parseEnvironment(text, path);
}
