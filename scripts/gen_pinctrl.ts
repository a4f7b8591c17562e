#!/usr/bin/env node
import { runPinctrlCli } from './lib/pinctrl/cli.js';

runPinctrlCli()
  .then((result) => {
    if (result.check && result.changed) {
      console.error(`\n${result.family} pin control output is out of date`);
      process.exit(1);
    }
  })
  .catch((error) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
