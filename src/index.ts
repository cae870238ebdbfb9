#!/usr/bin/env node
/**
 * cloud-migrate: move a Spring Boot backend and JavaScript frontend to
 * Cloud Run and Firebase Hosting.
 *
 * Usage:
 *   cloud-migrate migrate [options]
 *   cloud-migrate init [--force]
 *   cloud-migrate version
 */

import { runInit } from "./cli/init.js";
import { runMigrate } from "./cli/migrate.js";
import { formatVersion, readPackageInfo } from "./cli/version.js";

const USAGE = `
Usage: cloud-migrate <command> [options]

Commands:
  migrate    Run the migration pipeline (see: cloud-migrate migrate --help)
  init       Write an example migration.config.yaml
  version    Print the version
`;

async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;

  switch (command) {
    case "migrate":
      return runMigrate(rest);
    case "init":
      return runInit(rest);
    case "version":
    case "--version":
      console.log(formatVersion(readPackageInfo()));
      return 0;
    case undefined:
    case "help":
    case "--help":
    case "-h":
      console.log(USAGE);
      return 0;
    default:
      console.error(`Unknown command: ${command}`);
      console.log(USAGE);
      return 1;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Unexpected error:", err);
    process.exit(1);
  });
