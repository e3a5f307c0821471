import { describe, it, expect } from "vitest";
import { parseEnvironment } from "../environment/index.js";
import { RuleTable } from "../rules/table.js";
import { transformEnvironment } from "../transform/index.js";

const rules = RuleTable.fromRecord({
  Windows: ["vc14_runtime", "pywin32"],
  Linux: ["libgcc-ng"],
  MacOS: ["appnope"],
});

const windowsExport = `name: demo
channels:
  - conda-forge
  - defaults
dependencies:
  - python=3.12
  - numpy
  - vc14_runtime
  - pip:
      - requests
      - pywin32
`;

describe("transformEnvironment", () => {
  it("drops Windows runtimes and marks Windows-only pip packages", () => {
    const doc = parseEnvironment(windowsExport);
    const result = transformEnvironment(doc, "Windows", rules);

    expect(result.document.dependencies).toEqual([
      { kind: "spec", spec: "python=3.12" },
      { kind: "spec", spec: "numpy" },
      { kind: "pip", requirements: ["requests", 'pywin32 ; platform_system == "Windows"'] },
    ]);
    expect(result.dropped).toEqual(["vc14_runtime"]);
    expect(result.marked).toEqual(['pywin32 ; platform_system == "Windows"']);
  });

  it("is idempotent", () => {
    const once = transformEnvironment(parseEnvironment(windowsExport), "Windows", rules);
    const twice = transformEnvironment(once.document, "Windows", rules);
    expect(twice.document).toEqual(once.document);
    expect(twice.dropped).toEqual([]);
    expect(twice.marked).toEqual([]);
  });

  it("does not mutate its input", () => {
    const doc = parseEnvironment(windowsExport);
    const before = structuredClone(doc);
    const result = transformEnvironment(doc, "Windows", rules);
    expect(doc).toEqual(before);
    expect(result.document.dependencies).not.toBe(doc.dependencies);
    expect(result.document.channels).not.toBe(doc.channels);
  });

  it("keeps name and channels", () => {
    const result = transformEnvironment(parseEnvironment(windowsExport), "Windows", rules);
    expect(result.document.name).toBe("demo");
    expect(result.document.channels).toEqual(["conda-forge", "defaults"]);
  });

  it("is a no-op when the platform has no entries", () => {
    const doc = parseEnvironment(windowsExport);
    const empty = RuleTable.fromRecord({ Windows: ["vc14_runtime"] });
    const result = transformEnvironment(doc, "Linux", empty);
    expect(result.document.dependencies).toEqual(doc.dependencies);
    expect(result.dropped).toEqual([]);
    expect(result.marked).toEqual([]);
  });

  it("only applies the origin platform's entries", () => {
    const doc = parseEnvironment(`dependencies:
  - libgcc-ng=13.2
  - vc14_runtime
`);
    const result = transformEnvironment(doc, "Linux", rules);
    expect(result.document.dependencies).toEqual([{ kind: "spec", spec: "vc14_runtime" }]);
    expect(result.dropped).toEqual(["libgcc-ng=13.2"]);
  });

  it("matches names case-insensitively and ignores version constraints", () => {
    const doc = parseEnvironment(`dependencies:
  - VC14_Runtime=14.38.33130
  - python=3.12
  - pip:
      - PyWin32==306
`);
    const result = transformEnvironment(doc, "Windows", rules);
    expect(result.document.dependencies).toEqual([
      { kind: "spec", spec: "python=3.12" },
      { kind: "pip", requirements: ['PyWin32==306 ; platform_system == "Windows"'] },
    ]);
  });

  it("matches exact names only", () => {
    const doc = parseEnvironment(`dependencies:
  - vc14_runtime_extras
  - pip:
      - pywin32-stubs
`);
    const result = transformEnvironment(doc, "Windows", rules);
    expect(result.document.dependencies).toEqual(doc.dependencies);
  });

  it("leaves requirements that already carry a marker alone", () => {
    const doc = parseEnvironment(`dependencies:
  - pip:
      - "pywin32==306; sys_platform == 'win32'"
`);
    const result = transformEnvironment(doc, "Windows", rules);
    expect(result.document.dependencies).toEqual([
      { kind: "pip", requirements: ["pywin32==306; sys_platform == 'win32'"] },
    ]);
    expect(result.marked).toEqual([]);
  });

  it("uses Darwin as the marker name for MacOS", () => {
    const doc = parseEnvironment(`dependencies:
  - appnope
  - pip:
      - appnope==0.1.4
`);
    const result = transformEnvironment(doc, "MacOS", rules);
    expect(result.document.dependencies).toEqual([
      { kind: "pip", requirements: ['appnope==0.1.4 ; platform_system == "Darwin"'] },
    ]);
  });

  it("preserves order across several pip blocks and opaque entries", () => {
    const doc = parseEnvironment(`dependencies:
  - pip:
      - pywin32
  - numpy
  - nodejs: 20
  - vc14_runtime
  - pip:
      - rich
`);
    const result = transformEnvironment(doc, "Windows", rules);
    expect(result.document.dependencies).toEqual([
      { kind: "pip", requirements: ['pywin32 ; platform_system == "Windows"'] },
      { kind: "spec", spec: "numpy" },
      { kind: "opaque", value: { nodejs: 20 } },
      { kind: "pip", requirements: ["rich"] },
    ]);
  });

  it("returns an empty list for an empty dependency list", () => {
    const result = transformEnvironment(parseEnvironment("dependencies: []\n"), "Windows", rules);
    expect(result.document.dependencies).toEqual([]);
  });

  it("removes machine-specific keys and keeps other unknown keys in order", () => {
    const doc = parseEnvironment(`name: demo
prefix: C:\\Users\\someone\\miniconda3\\envs\\demo
dependencies:
  - numpy
variables:
  OMP_NUM_THREADS: "1"
channel_priority: strict
`);
    const result = transformEnvironment(doc, "Windows", rules);
    expect(result.strippedKeys).toEqual(["prefix", "channel_priority"]);
    expect(result.document.extras).toEqual({ variables: { OMP_NUM_THREADS: "1" } });
    expect(result.document.keyOrder).toEqual(["name", "dependencies", "variables"]);
  });

  describe("openblas", () => {
    const mklExport = `dependencies:
  - python=3.12
  - mkl=2023.1.0
  - mkl-service
  - numpy
`;

    it("drops MKL packages and pins OpenBLAS first", () => {
      const result = transformEnvironment(parseEnvironment(mklExport), "Windows", rules, { openblas: true });
      expect(result.document.dependencies).toEqual([
        { kind: "spec", spec: "libblas=*=*openblas" },
        { kind: "spec", spec: "python=3.12" },
        { kind: "spec", spec: "numpy" },
      ]);
      expect(result.dropped).toEqual(["mkl=2023.1.0", "mkl-service"]);
    });

    it("adds the pin only once", () => {
      const once = transformEnvironment(parseEnvironment(mklExport), "Windows", rules, { openblas: true });
      const twice = transformEnvironment(once.document, "Windows", rules, { openblas: true });
      expect(twice.document).toEqual(once.document);
    });

    it("is off by default", () => {
      const result = transformEnvironment(parseEnvironment(mklExport), "Windows", rules);
      expect(result.document.dependencies).toHaveLength(4);
    });
  });
});
