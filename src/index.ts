#!/usr/bin/env node

import process from 'process';

import { parseCliArgs, USAGE } from './cli.js';
import { resolveSettings } from './config.js';
import { buildPresentation, readDocxOutline } from './tools/docx/index.js';
import { DocxError } from './tools/docx/errors.js';
import { SUCCESS_MESSAGE } from './tools/docx/constants.js';
import { logger, setLogLevel } from './utils/logger.js';

async function run(argv: string[]): Promise<void> {
  const cli = parseCliArgs(argv);

  if (cli.command === 'help') {
    console.log(USAGE);
    return;
  }

  if (cli.command === 'inspect') {
    const outline = await readDocxOutline(cli.args.path);
    console.log(JSON.stringify(outline, null, 2));
    return;
  }

  const settings = await resolveSettings(cli.args);
  setLogLevel(settings.logLevel);
  if (settings.configPath) {
    logger.debug(`Using config ${settings.configPath}`);
  }

  await buildPresentation(settings.build);
  console.log(SUCCESS_MESSAGE);
}

run(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof DocxError) {
    logger.error(`${error.code}: ${error.message}`);
    logger.debug(JSON.stringify(error.toJSON()));
  } else {
    logger.error(error instanceof Error ? error.stack ?? error.message : String(error));
  }
  process.exitCode = 1;
});
