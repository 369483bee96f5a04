#!/usr/bin/env node
import { loadConfig, createLogger } from './infrastructure/index.js';
import { parseCliArgs, runCommand, USAGE } from './interfaces/cli.js';

/**
 * CLI entry point: `triage-loop <command> [flags]`.
 *
 * Configuration comes from the environment; see `loadConfig`.
 */
const { config, warnings } = loadConfig();
const log = createLogger(config.logLevel);
for (const warning of warnings) log.warn(warning);

const parsed = parseCliArgs(process.argv.slice(2));
if (!parsed.ok) {
  process.stderr.write(`${parsed.error}\n\n${USAGE}`);
  process.exit(2);
}

const { command, options } = parsed;

runCommand(command, options, config, log)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.fatal({ err, command }, 'Command failed');
    process.exit(1);
  });
