#!/usr/bin/env node
import { Command } from "commander";
import { detectCommand } from "./commands/detect.js";
import { installCommand } from "./commands/install.js";
import { shellCommand } from "./commands/shell.js";
import { statusCommand } from "./commands/status.js";
import { validateCommand } from "./commands/validate.js";
import { DEFAULT_PROFILE } from "./loader.js";

const program = new Command();

program
  .name("hostprep")
  .description("Provision a container runtime and shell environment on this host")
  .version("0.1.0");

program
  .command("install [profile]")
  .description(`Install the runtime described by a profile (default: ${DEFAULT_PROFILE})`)
  .option("--dry-run", "Detect and print the plan without changing anything")
  .option("-y, --yes", "Skip confirmation prompt")
  .option("--no-sudo", "Run privileged commands directly (already root)")
  .option("--user <name>", "User to add to the runtime group")
  .option("--verbose", "Echo every command and its output")
  .option("-q, --quiet", "Only print warnings and errors")
  .action(installCommand);

program
  .command("shell [profile]")
  .description("Set up zsh, Oh My Zsh and Starship for the current user")
  .option("--no-sudo", "Run privileged commands directly (already root)")
  .option("--verbose", "Echo every command and its output")
  .option("-q, --quiet", "Only print warnings and errors")
  .action(shellCommand);

program
  .command("detect [profile]")
  .description("Show the detected platform and whether a profile supports it")
  .action(detectCommand);

program
  .command("validate [profile]")
  .description("Validate a provisioning profile")
  .action((profile: string | undefined) => validateCommand(profile ?? DEFAULT_PROFILE));

program
  .command("status")
  .description("Show recorded provisioning runs")
  .action(statusCommand);

await program.parseAsync();
