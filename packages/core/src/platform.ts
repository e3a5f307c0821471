import { PLATFORM_IDS, MARKER_PLATFORM_NAMES, CONDA_SUBDIRS } from "@conda-portable/shared";
import type { PlatformId, CondaSubdir } from "@conda-portable/shared";
import { UnknownPlatformError } from "./errors.js";

export function isPlatformId(value: string): value is PlatformId {
  return (PLATFORM_IDS as readonly string[]).includes(value);
}

/**
 * Parse an origin platform. Matching is case-sensitive: "windows" is rejected.
 */
export function parsePlatformId(value: string): PlatformId {
  if (!isPlatformId(value)) {
    throw new UnknownPlatformError(value);
  }
  return value;
}

export function markerPlatformName(platform: PlatformId): string {
  return MARKER_PLATFORM_NAMES[platform];
}

export function isCondaSubdir(value: string): value is CondaSubdir {
  return (CONDA_SUBDIRS as readonly string[]).includes(value);
}
