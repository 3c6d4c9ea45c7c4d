#!/usr/bin/env tsx
// bin/recurforge.ts
// recurforge CLI entry point
//
// Run:  npx tsx bin/recurforge.ts <command> [options]

import { buildConfig, consoleIo, parseCliArgs, reportError, runCli, startWatch } from "./recurforge-cli-lib";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): void {
  const argv = process.argv.slice(2);
  const args = parseCliArgs(argv);

  // watch keeps the process alive; everything else exits with a code
  if (args.command === "watch" && !args.help && !args.version && args.errors.length === 0) {
    try {
      const { config, warnings } = buildConfig(args);
      for (const w of warnings) consoleIo.err(`warning: ${w}`);
      const watcher = startWatch(config, consoleIo, args.verbose);
      process.on("SIGINT", () => {
        watcher.close();
        process.exit(0);
      });
    } catch (error) {
      reportError(error, consoleIo);
      process.exit(1);
    }
    return;
  }

  process.exit(runCli(argv, consoleIo));
}

main();
