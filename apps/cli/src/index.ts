#!/usr/bin/env node
import { Command } from "commander";
import { portableCommand } from "./commands/portable.js";
import type { PortableCommandOptions } from "./commands/portable.js";

const program = new Command();

program
  .name("conda-portable")
  .description("Make a conda environment.yml portable across platforms and verify it with conda-lock")
  .version("0.3.0")
  .requiredOption("--env <path>", "Path to environment.yml")
  .requiredOption("--from_platform <platform>", "Platform the environment.yml was exported from (Windows | Linux | MacOS)")
  .option("--rules <file...>", "Extra rule files of platform-locked packages")
  .option("--target <subdir...>", "Target platforms for conda-lock (default: win-64 osx-arm64 linux-64)")
  .option("--openblas", "Replace MKL packages with an OpenBLAS pin")
  .option("--no-mamba", "Do not pass --mamba to conda-lock")
  .option("--no-lock", "Only write the portable environment file")
  .option("--json", "Output as JSON")
  .action((options: PortableCommandOptions) => portableCommand(options));

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
