#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { version as pkgVersion } from '../package.json';
import { createPushCommand } from './cli/push';
import { handleError } from './errors/handler';
import { logger, LogLevel } from './utils/logger';
import { isDebug } from './utils/output';

// Handle unhandled rejections
process.on('unhandledRejection', (error: unknown) => {
  handleError(error, isDebug());
  process.exit(1);
});

process.on('uncaughtException', (error: unknown) => {
  handleError(error, isDebug());
  process.exit(1);
});

program
  .name('signature-push')
  .description(
    chalk.blue.bold('Signature Push') +
    '\n\nUpload detached container image signatures to a signature server.'
  )
  .version(pkgVersion, '-v, --version', 'Display version')
  .option('-d, --debug', 'Enable debug output')
  .option('--verbose', 'Show detailed output (default is minimal for scripting)')
  .option('-q, --quiet', 'Suppress all non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();

    if (opts.debug) {
      process.env.DEBUG = 'true';
      logger.setLevel(LogLevel.DEBUG);
    }

    if (opts.verbose) {
      process.env.VERBOSE = 'true';
    }

    // Quiet takes precedence
    if (opts.quiet) {
      process.env.QUIET = 'true';
      logger.setLevel(LogLevel.ERROR);
    }
  });

program.addCommand(createPushCommand());

program.on('--help', () => {
  console.log('');
  console.log(chalk.bold('Environment:'));
  console.log(`  ${chalk.dim('SIGNATURE_SERVER_URL')}       overrides container-image-signature-server-url`);
  console.log(`  ${chalk.dim('SIGNATURE_SERVER_USERNAME')}  overrides container-image-signature-server-username`);
  console.log(`  ${chalk.dim('SIGNATURE_SERVER_PASSWORD')}  overrides container-image-signature-server-password`);
  console.log('');
  console.log(chalk.bold('Examples:'));
  console.log('  $ signature-push push --config step-config.json --results step-results.json');
  console.log('  $ echo "$PASS" | signature-push push -c step-config.json -r step-results.json --password-stdin');
  console.log('  $ signature-push push --server-url https://sigs.example.com/signatures \\');
  console.log('      --signature-file ./signature-1 --signature-name user/app@sha256=2cbd/signature-1');
  console.log('');
});

program.parse();
