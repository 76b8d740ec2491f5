#!/usr/bin/env node
import { Command } from "commander";
import { inspectCommand, runCommand, sitesCommand, type RunCommandOptions } from "../src/cli.js";

const DEFAULT_CONFIG = process.env.CONFIG_PATH || "config.json";

const program = new Command();

program
  .name("iis-job-alerts")
  .description("Report new job postings from Spanish health-research institutes")
  .version("1.0.0");

program
  .command("run", { isDefault: true })
  .description("Check every active site and report postings not seen before")
  .option("-c, --config <path>", "Config file", DEFAULT_CONFIG)
  .option("-s, --site <name>", "Only process this site")
  .option("--dry-run", "Do not write the ledger or send e-mail")
  .option("-o, --output <path>", "Write the run summary as JSON")
  .action(async (options: RunCommandOptions) => {
    process.exitCode = await runCommand(options);
  });

program
  .command("sites")
  .description("List configured sites")
  .option("-c, --config <path>", "Config file", DEFAULT_CONFIG)
  .action(async (options: Pick<RunCommandOptions, "config">) => {
    process.exitCode = await sitesCommand(options);
  });

program
  .command("inspect <site>")
  .description("Fetch and extract one site, printing every candidate without touching the ledger")
  .option("-c, --config <path>", "Config file", DEFAULT_CONFIG)
  .action(async (siteName: string, options: Pick<RunCommandOptions, "config">) => {
    process.exitCode = await inspectCommand(siteName, options);
  });

await program.parseAsync();
