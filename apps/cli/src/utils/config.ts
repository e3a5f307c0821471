import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { CP_CONFIG_DIR, CP_CONFIG_FILE } from "@conda-portable/shared";
import { errorMessage } from "@conda-portable/core";

export const ConfigSchema = z
  .object({
    rules: z.array(z.string()).optional(),
    solver_command: z.string().min(1).optional(),
    targets: z.array(z.string()).min(1).optional(),
    mamba: z.boolean().optional(),
  })
  .strict();

export type CondaPortableConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function configPath(): string {
  return join(homedir(), CP_CONFIG_DIR, CP_CONFIG_FILE);
}

/**
 * Load the optional user config. A missing file means defaults.
 */
export function loadConfig(path: string = configPath()): CondaPortableConfig {
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Invalid config file ${path}: ${errorMessage(err)}`);
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid config file ${path}: ${issues.join("; ")}`);
  }
  return result.data;
}
