import type { PlatformId } from "@conda-portable/shared";
import { markerPlatformName } from "../platform.js";

export function markerClause(platform: PlatformId): string {
  return `platform_system == "${markerPlatformName(platform)}"`;
}

export function hasMarker(requirement: string): boolean {
  return requirement.includes(";");
}

/**
 * Restrict a pip requirement to `platform`. Requirements that already carry a
 * marker are returned unchanged.
 */
export function withPlatformMarker(requirement: string, platform: PlatformId): string {
  if (hasMarker(requirement)) return requirement;
  return `${requirement} ; ${markerClause(platform)}`;
}
