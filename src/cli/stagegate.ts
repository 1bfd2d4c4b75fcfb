#!/usr/bin/env node
import { runStagegateCli } from '../stagegate/cli';

runStagegateCli(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch(err => {
    console.error(err);
    process.exit(1);
  });
