#!/usr/bin/env node
import { config, validateConfig } from './config/curator.config';
import { CliCommand, USAGE, parseCli, versionText } from './cli/args';
import { HttpClient } from './clients/base/HttpClient';
import { CuratorService } from './services/curator.service';
import { ConsoleReviewPrompt } from './services/review/ConsoleReviewPrompt';
import { WikiTableSource } from './services/sources/WikiTableSource';
import { CuratorError, ValidationError, describeError, exitCodeFor } from './utils/errors';
import { configureLogger, logger } from './utils/logger';

export function logFatalError(error: unknown): void {
  if (error instanceof CuratorError) {
    logger.error(`[Curator] ${error.message}`);
  } else if (error instanceof Error) {
    logger.error(`[Curator] Unexpected error: ${error.message}`, { stack: error.stack });
  } else {
    logger.error(`[Curator] Unexpected error: ${describeError(error)}`);
  }
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let command: CliCommand;
  try {
    validateConfig(config);
    command = parseCli(argv, { threshold: config.matching.defaultThreshold });
  } catch (error) {
    logFatalError(error);
    if (error instanceof ValidationError) {
      process.stderr.write(`\n${USAGE}\n`);
    }
    return exitCodeFor(error);
  }

  if (command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }
  if (command.kind === 'version') {
    process.stdout.write(`${versionText()}\n`);
    return 0;
  }

  const { options } = command;
  configureLogger({ level: options.logLevel, logFile: options.logFile });

  const prompt = options.interactiveReview ? new ConsoleReviewPrompt() : undefined;
  const httpClient = new HttpClient(
    { timeout: config.http.timeout, userAgent: config.http.userAgent },
    'WikiTable'
  );
  const curator = new CuratorService({
    titleSource: new WikiTableSource(httpClient),
    reviewPort: prompt,
  });

  try {
    await curator.run({
      inputPath: options.inputPath,
      outputPath: options.outputPath,
      urls: options.urls,
      threshold: options.threshold,
      interactiveReview: options.interactiveReview,
      expand: { homebrew: options.checkHomebrew, japan: options.checkJapan },
      header: config.header,
    });
    return 0;
  } catch (error) {
    logFatalError(error);
    return exitCodeFor(error);
  } finally {
    prompt?.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      logFatalError(error);
      process.exitCode = 1;
    });
}
