import { Logger } from '@aws-lambda-powertools/logger';
import type { Context } from 'aws-lambda';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const childLoggers: Logger[] = [];

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

const defaultValues = {
  region: process.env.AWS_REGION,
  environment: process.env.ENVIRONMENT || 'N/A',
};

// Read from a package.json beside this module, which only a bundled deployment puts there. Unbundled runs log 'unknown'.
function getReleaseVersion(): string {
  let version = 'unknown';
  try {
    const packageFilePath = path.resolve(moduleDir, 'package.json');
    const parsed: unknown = JSON.parse(fs.readFileSync(packageFilePath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      version = parsed.version;
    }
  } catch (error) {
    logger.debug(`Failed to read package.json for version: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
  return version;
}

function setContext(context: Context, module?: string) {
  const version = getReleaseVersion();
  logger.addPersistentLogAttributes({
    'aws-request-id': context.awsRequestId,
    'function-name': context.functionName,
    version,
    module: module,
  });

  childLoggers.forEach((childLogger) => {
    childLogger.addPersistentLogAttributes({
      'aws-request-id': context.awsRequestId,
      'function-name': context.functionName,
      version,
    });
  });
}

const logger = new Logger({
  persistentLogAttributes: {
    ...defaultValues,
  },
});

function createChildLogger(module: string): Logger {
  const childLogger = logger.createChild({
    persistentLogAttributes: {
      module: module,
    },
  });

  childLoggers.push(childLogger);
  return childLogger;
}

export { createChildLogger, logger, setContext };
