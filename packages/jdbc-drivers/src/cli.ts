#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { createServices } from "./lib/services.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommand } from "./modules/download.js";
import { registerListCommand } from "./modules/list.js";
import { registerLocateCommand } from "./modules/locate.js";
import { registerVerifyCommand } from "./modules/verify.js";

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof manifest === "object" && manifest !== null && "version" in manifest && typeof manifest.version === "string") {
    return manifest.version;
  }
  return "0.0.0";
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("jdbc-drivers")
    .description("Download, locate and verify JDBC driver jars")
    .version(readVersion())
    .option("--json", "Output JSON instead of human-readable text")
    .option("-q, --quiet", "Suppress spinners and progress output")
    .option("-y, --yes", "Answer yes to confirmation prompts")
    .option("--no-input", "Never prompt; questions get their safe default");

  const services = createServices();

  registerDownloadCommand(program, services);
  registerLocateCommand(program, services);
  registerListCommand(program, services);
  registerVerifyCommand(program, services);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
