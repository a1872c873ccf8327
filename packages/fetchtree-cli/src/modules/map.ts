import { Command } from "commander";
import chalk from "chalk";
import { resolve } from "path";
import { loadConfig } from "../lib/config.js";
import { mapToLocalPath } from "../lib/path-mapper.js";
import { maybeOutputJson, type MapResultJson } from "../lib/json-output.js";
import { validateUri } from "../lib/uri-list.js";

interface MapOptions {
  dir?: string;
  replacement?: string;
  config?: string;
}

export function registerMapCommands(program: Command): void {
  program
    .command("map")
    .description("Print the local path each URI would be downloaded to")
    .argument("<uris...>", "Absolute http(s) URIs")
    .option("-d, --dir <path>", "Download directory")
    .option("-r, --replacement <char>", "Replacement for unsafe file name characters")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .action((uris: string[], options: MapOptions) => {
      mapCommand(uris, options);
    });
}

/**
 * Resolve mappings without touching the network or the download tree.
 * Stops at the first URI that is not absolute http(s).
 */
export function mapCommand(uris: string[], options: MapOptions): MapResultJson {
  const { config } = loadConfig(options.config, {
    downloadDir: options.dir,
    replacement: options.replacement,
  });
  const downloadDir = resolve(config.downloadDir);

  const result: MapResultJson = {
    downloadDir,
    mappings: uris.map((uri) => ({
      uri,
      path: mapToLocalPath(downloadDir, validateUri(uri), {
        replacement: config.replacement,
      }),
    })),
  };

  if (!maybeOutputJson(result)) {
    for (const { uri, path } of result.mappings) {
      console.log(`${chalk.gray(uri)} → ${path}`);
    }
  }

  return result;
}
