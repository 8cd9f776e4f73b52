#!/usr/bin/env node
import { Command } from "commander";
import pkg from "../package.json" with { type: "json" };
import {
  createFetchDownloadService,
  createProcessSignalHandler,
  realDelay,
  systemClock,
} from "./lib/adapters/index.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommand } from "./modules/download.js";

export async function main(argv = process.argv): Promise<void> {
  const program = new Command()
    .name("seqdl")
    .description("Download sequentially numbered files from a bracketed URL pattern")
    .version(pkg.version, "-V, --version");

  registerDownloadCommand(program, {
    createDownloader: (settings) => createFetchDownloadService(settings),
    signals: createProcessSignalHandler(),
    delay: realDelay,
    clock: systemClock,
  });
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

void main();
