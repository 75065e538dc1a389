import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import { handleError } from '../errors/handler';
import { resolveCredentialOverrides } from '../credentials';
import { SignatureUploader } from '../signature/uploader';
import { PushSignatureStep } from '../step/push-signature';
import { StepResult } from '../step/step-result';
import {
  envOverrides,
  emptyResults,
  getResultValue,
  loadResults,
  loadStepConfig,
  recordStepResult,
  resolveConfig,
  saveResults,
} from '../step/config';
import {
  CONFIG_SERVER_URL,
  CONFIG_SERVER_USERNAME,
  RESULT_SIGNATURE_FILE_PATH,
  RESULT_SIGNATURE_NAME,
  RESULT_SIGNATURE_URL,
  RESULT_SIGNATURE_FILE_MD5,
  RESULT_SIGNATURE_FILE_SHA1,
  ConfigValues,
} from '../types/step';
import { isDebug, isVerbose, isQuiet, outputResult } from '../utils/output';
import { logger } from '../utils/logger';

export interface PushOptions {
  config?: string;
  results?: string;
  signatureFile?: string;
  signatureName?: string;
  serverUrl?: string;
  username?: string;
  passwordStdin?: boolean;
  timeout?: number;
  save: boolean;
}

export function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds.');
  }
  return timeout;
}

/**
 * Resolve config and prior results, run the step, and record its
 * artifacts in the results file when one is given.
 */
export async function executePush(options: PushOptions): Promise<StepResult> {
  const fileConfig = options.config ? await loadStepConfig(options.config) : {};
  const flagConfig: ConfigValues = {
    [CONFIG_SERVER_URL]: options.serverUrl,
    [CONFIG_SERVER_USERNAME]: options.username,
  };

  const config = resolveConfig(
    PushSignatureStep.configDefaults(),
    fileConfig,
    envOverrides(),
    await resolveCredentialOverrides(options),
    flagConfig
  );

  const store = options.results ? await loadResults(options.results) : emptyResults();
  const previousResults = {
    [RESULT_SIGNATURE_FILE_PATH]: options.signatureFile ?? getResultValue(store, RESULT_SIGNATURE_FILE_PATH),
    [RESULT_SIGNATURE_NAME]: options.signatureName ?? getResultValue(store, RESULT_SIGNATURE_NAME),
  };

  const step = new PushSignatureStep(new SignatureUploader({ timeout: options.timeout }));
  const result = await step.run(config, previousResults);

  if (result.success && options.results && options.save) {
    await saveResults(options.results, recordStepResult(store, result));
    logger.debug(`Recorded ${step.stepName} results in ${options.results}`);
  }

  return result;
}

/**
 * Create the push command
 */
export function createPushCommand(): Command {
  const cmd = new Command('push');

  cmd
    .description('Upload a container image signature file to a signature server')
    .option('-c, --config <file>', 'Step configuration file (JSON)')
    .option('-r, --results <file>', 'Step results file to read prior results from and record results in')
    .option('--signature-file <path>', 'Signature file to upload (overrides container-image-signature-file-path)')
    .option('--signature-name <name>', 'Name to store the signature under (overrides container-image-signature-name)')
    .option('--server-url <url>', 'Signature server URL')
    .option('--username <name>', 'Signature server username')
    .option('--password-stdin', 'Read signature server password from stdin')
    .option('--timeout <ms>', 'Upload request timeout in milliseconds', parseTimeout)
    .option('--no-save', 'Do not record results in the results file')
    .action(async (options: PushOptions) => {
      const startTime = Date.now();

      try {
        if (isVerbose()) {
          console.log(boxen(
            chalk.bold('Push Details\n\n') +
            `${chalk.cyan('Config:')} ${options.config ?? '(none)'}\n` +
            `${chalk.cyan('Results:')} ${options.results ?? '(none)'}`,
            {
              padding: 1,
              borderColor: 'blue',
              borderStyle: 'round',
              margin: { top: 1, right: 0, bottom: 1, left: 0 }
            }
          ));
        }

        const spinner = isVerbose() ? ora('Pushing signature...').start() : null;
        let result: StepResult;
        try {
          result = await executePush(options);
        } catch (error) {
          spinner?.fail('Push failed');
          throw error;
        }

        if (!result.success) {
          spinner?.fail('Push failed');
          console.error(chalk.red.bold('\n✗ Error:'), result.message);
          process.exit(1);
        }

        spinner?.succeed(chalk.green('Upload complete'));

        const url = result.getArtifactValue(RESULT_SIGNATURE_URL) ?? '';
        if (isVerbose()) {
          const elapsedTime = (Date.now() - startTime) / 1000;
          console.log(chalk.green.bold('\n✓ Signature pushed!\n'));
          console.log(chalk.dim('Details:'));
          console.log(`  ${chalk.cyan('URL:')} ${url}`);
          console.log(`  ${chalk.cyan('MD5:')} ${result.getArtifactValue(RESULT_SIGNATURE_FILE_MD5)}`);
          console.log(`  ${chalk.cyan('SHA1:')} ${result.getArtifactValue(RESULT_SIGNATURE_FILE_SHA1)}`);
          console.log(`  ${chalk.cyan('Duration:')} ${elapsedTime.toFixed(2)}s`);
        } else if (!isQuiet()) {
          outputResult(url);
        }
      } catch (error) {
        handleError(error, isDebug());
        process.exit(1);
      }
    });

  return cmd;
}
