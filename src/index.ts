#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { checkCommand } from "./cli/commands/check";
import { NAME, VERSION } from "./cli/ui";

function printHelp(): void {
  p.intro(`${color.cyan(NAME)} ${color.dim(`v${VERSION}`)} - Live host backup without downtime`);

  p.note(
    `${color.cyan("backup")}      Capture this host into a compressed archive
${color.cyan("check")}       Project the disk space a backup would need`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `sudo hostkeep backup                  ${color.dim("# Full backup with defaults")}
sudo hostkeep backup --keep-staging   ${color.dim("# Keep the uncompressed tree")}
hostkeep check                        ${color.dim("# Preflight space projection")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("hostkeep <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`${NAME} v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "check":
      return checkCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("hostkeep --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
