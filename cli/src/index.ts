#!/usr/bin/env node

/**
 * MITS11 Bootstrap CLI — Entry Point
 *
 *   mits11-bootstrap [target] [-s|--silent] [--no-elevate] [--debug]
 *
 * Environment:
 *   MITS11_CACHE_DIR        Package cache directory
 *   MITS11_KEEP_TMP         Keep temporary files after exit (1/true/yes/on)
 *   MITS11_BASE_URL         Release endpoint
 *   MITS11_MANIFEST_PARSER  auto | structured | pattern
 */

import { Command } from "commander";
import { registerInstallCommand } from "./commands/install";

const program = new Command();

program
  .name("mits11-bootstrap")
  .description("Download, verify and run the MITS11 installer")
  .version("0.1.0");

registerInstallCommand(program);

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
