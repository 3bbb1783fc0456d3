#!/usr/bin/env -S npx tsx
import "dotenv/config";
import { Command } from "commander";
import { processCommand } from "./commands/process";
import { projectsCommand } from "./commands/projects";
import { compareCommand } from "./commands/compare";
import { exportCommand } from "./commands/export";
import { buildDataCommand } from "./build-data";

const program = new Command()
  .name("interview-themes")
  .description("Theme discovery and per-group question counts for interview responses")
  .version("1.0.0");

// Register all commands
program.addCommand(processCommand);
program.addCommand(projectsCommand);
program.addCommand(compareCommand);
program.addCommand(exportCommand);
program.addCommand(buildDataCommand);

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync();
}
