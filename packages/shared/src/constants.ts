export const CP_CONFIG_DIR = ".conda-portable";
export const CP_CONFIG_FILE = "config.json";

/** Infix inserted before the extension of the exported file: environment.yml → environment.portable.yml */
export const PORTABLE_SUFFIX = ".portable";

export const DEFAULT_SOLVER_COMMAND = "conda-lock";
export const SOLVER_INSTALL_HINT = "Install with: pip install conda-lock";

export const PLATFORM_IDS = ["Windows", "Linux", "MacOS"] as const;

export type PlatformId = (typeof PLATFORM_IDS)[number];

// Names used by PEP 508 `platform_system`
export const MARKER_PLATFORM_NAMES: Record<PlatformId, string> = {
  Windows: "Windows",
  Linux: "Linux",
  MacOS: "Darwin",
};

export const CONDA_SUBDIRS = [
  "linux-64",
  "linux-aarch64",
  "linux-ppc64le",
  "osx-64",
  "osx-arm64",
  "win-64",
  "win-arm64",
] as const;

export type CondaSubdir = (typeof CONDA_SUBDIRS)[number];

export const DEFAULT_TARGET_PLATFORMS: readonly CondaSubdir[] = ["win-64", "osx-arm64", "linux-64"];

/** Top-level keys that describe the exporting machine rather than the environment. */
export const MACHINE_SPECIFIC_KEYS = ["prefix", "channel_priority"] as const;

export const MKL_PACKAGES = ["mkl", "mkl-service", "intel-openmp", "openmp"] as const;
export const OPENBLAS_SPEC = "libblas=*=*openblas";
