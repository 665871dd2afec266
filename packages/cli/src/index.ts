#!/usr/bin/env node

import "source-map-support/register.js";
import {getSlashwatchCli} from "./cli.js";
import {YargsError} from "./util/index.js";

const slashwatch = getSlashwatchCli();

void slashwatch
  .fail((msg, err) => {
    // Show command help message when no command is provided
    if (msg?.includes("Not enough non-option arguments")) {
      slashwatch.showHelp();
      console.log("\n");
    }

    const errorMessage =
      err !== undefined ? (err instanceof YargsError ? err.message : err.stack) : msg || "Unknown error";

    console.error(` ✖ ${errorMessage}\n`);
    process.exit(1);
  })

  // Execute CLI
  .parse();
