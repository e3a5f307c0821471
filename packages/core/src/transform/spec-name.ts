const VERSION_OPERATORS = ["===", "==", ">=", "<=", "!=", "~=", "=", ">", "<"] as const;

/**
 * Package name of a conda match spec or a pip requirement, lower-cased.
 *
 *   "numpy>=1.26 ; python_version >= '3.9'" → "numpy"
 *   "conda-forge::vc14_runtime=14.3"        → "vc14_runtime"
 *   "requests[socks]==2.32"                 → "requests"
 */
export function baseName(spec: string): string {
  let name = spec.split(";", 1)[0];
  const channelSep = name.indexOf("::");
  if (channelSep !== -1) name = name.slice(channelSep + 2);
  name = name.split("[", 1)[0].split("@", 1)[0].trim();
  name = name.split(/\s/, 1)[0];

  for (const op of VERSION_OPERATORS) {
    const idx = name.indexOf(op);
    if (idx !== -1) {
      name = name.slice(0, idx);
      break;
    }
  }
  return name.trim().toLowerCase();
}

/**
 * Whether a spec names a platform-locked package. Exact, case-insensitive
 * membership; the same names serve conda specs and pip requirements.
 */
export function isPlatformLocked(spec: string, excluded: ReadonlySet<string>): boolean {
  const name = baseName(spec);
  return name !== "" && excluded.has(name);
}
