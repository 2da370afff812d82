#!/usr/bin/env tsx
/**
 * convert.ts — Converts Jupyter notebooks for the documentation examples.
 *
 * Usage:
 *   tsx convert.ts [options]        (see --help)
 *
 * For every notebook in the source directory, one at a time:
 *   .ipynb → source script   (jupyter-nbconvert --to=script)
 *   .ipynb → markdown        (jupyter-nbconvert --to=markdown --execute, with
 *                             cell outputs and figures embedded)
 *
 * The markdown directory is then copied over the documentation project's
 * examples directory, replacing whatever was there.
 */

import { USAGE, resolveConfig } from './lib/config';
import { runConversion } from './lib/driver';
import { ConfigError, errorMessage } from './lib/errors';

async function main(): Promise<void> {
  const { help, config } = resolveConfig(process.argv.slice(2));
  if (help) {
    process.stdout.write(USAGE);
    return;
  }

  const summary = await runConversion(config);
  if (summary.results.some(r => !r.ok)) process.exitCode = 1;
}

main().catch(err => {
  console.error(errorMessage(err));
  if (err instanceof ConfigError) console.error('\n' + USAGE);
  process.exit(1);
});
