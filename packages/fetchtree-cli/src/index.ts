#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerDownloadCommands } from "./modules/download.js";
import { registerMapCommands } from "./modules/map.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  return PackageSchema.parse(raw).version;
}

export function createProgram(): Command {
  const program = new Command()
    .name("fetchtree")
    .description("Mirror remote files into a local directory tree")
    .version(readVersion())
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Suppress progress output")
    .option("--timeout <ms>", "Per-request timeout in milliseconds")
    .option("--retry <attempts>", "Total HTTP attempts per request");

  registerDownloadCommands(program);
  registerMapCommands(program);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
