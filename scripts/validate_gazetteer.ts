import fs from 'fs-extra';

import { defaultGazetteerDir } from './lib/gazetteer.js';
import { validateGazetteer } from './lib/gazetteer_validation.js';
import { resolveUserPath, toPosixRelative } from './lib/io.js';
import { parseCliOptionMap } from './lib/address_cli/cli.js';

async function main(): Promise<void> {
  const options = parseCliOptionMap(process.argv.slice(2));
  const dataDir = options.get('data-dir');
  const rootDir = dataDir ? resolveUserPath(dataDir) : defaultGazetteerDir();

  if (!(await fs.pathExists(rootDir))) {
    throw new Error(`Gazetteer directory not found: ${toPosixRelative(rootDir)}`);
  }

  const ctx = await validateGazetteer(rootDir);

  for (const error of ctx.errors) {
    console.log(`  ${error}`);
  }
  for (const warning of ctx.warnings) {
    console.log(`  ${warning}`);
  }

  console.log(`\n${ctx.errors.length} error(s), ${ctx.warnings.length} warning(s)`);

  if (ctx.errors.length > 0) {
    process.exit(1);
  }

  console.log('Validation passed.');
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
