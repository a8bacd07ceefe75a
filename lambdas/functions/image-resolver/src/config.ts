import { createChildLogger } from '@image-resolver/aws-powertools-util';

import { MAX_TIMEOUT_MS } from './deadline';
import { ImageResolutionError } from './errors';
import { compileQuery, isAccountId, type ImageQuery } from './query';

const logger = createChildLogger('config');

export const DEFAULT_RESOLVE_TIMEOUT_MS = 30000;

export interface ImageFamilyConfig {
  query: ImageQuery;
  /** SSM parameter that receives the resolved image id. */
  ssmParameterName?: string;
}

export interface Config {
  families: Record<string, ImageFamilyConfig>;
  timeoutMs: number;
  callerAccountId?: string;
  dryRun: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFamily(name: string, value: unknown): ImageFamilyConfig {
  const ownerScope = isRecord(value) ? value.ownerScope : undefined;
  const namePattern = isRecord(value) ? value.namePattern : undefined;
  const ssmParameterName = isRecord(value) ? value.ssmParameterName : undefined;
  if (typeof ownerScope !== 'string' || typeof namePattern !== 'string') {
    throw new Error(`IMAGE_FAMILIES entry ${name} must contain ownerScope (string) and namePattern (string)`);
  }
  if (ssmParameterName !== undefined && typeof ssmParameterName !== 'string') {
    throw new Error(`IMAGE_FAMILIES entry ${name} has a non-string ssmParameterName`);
  }

  const query: ImageQuery = { ownerScope, namePattern };
  try {
    compileQuery(query);
  } catch (error) {
    if (error instanceof ImageResolutionError) {
      throw new Error(`IMAGE_FAMILIES entry ${name} is invalid: ${error.message}`, { cause: error });
    }
    throw error;
  }

  return { query, ssmParameterName };
}

function parseFamilies(familiesStr: string): Record<string, ImageFamilyConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(familiesStr);
  } catch (error) {
    logger.error('Failed to parse IMAGE_FAMILIES', { error, familiesStr });
    throw new Error('Invalid IMAGE_FAMILIES format');
  }

  if (!isRecord(parsed) || Object.keys(parsed).length === 0) {
    throw new Error('IMAGE_FAMILIES must be a non-empty object of image families');
  }

  const families: Record<string, ImageFamilyConfig> = {};
  for (const [name, value] of Object.entries(parsed)) {
    families[name] = parseFamily(name, value);
  }
  return families;
}

export function getConfig(): Config {
  const familiesStr = process.env.IMAGE_FAMILIES;
  if (!familiesStr) {
    throw new Error('IMAGE_FAMILIES environment variable is not set');
  }
  const families = parseFamilies(familiesStr);

  const timeoutStr = process.env.RESOLVE_TIMEOUT_MS;
  const timeoutMs = timeoutStr ? Number(timeoutStr) : DEFAULT_RESOLVE_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new Error(`RESOLVE_TIMEOUT_MS must be a positive integer of at most ${MAX_TIMEOUT_MS}`);
  }

  const callerAccountId = process.env.CALLER_ACCOUNT_ID || undefined;
  if (callerAccountId !== undefined && !isAccountId(callerAccountId)) {
    throw new Error('CALLER_ACCOUNT_ID must be a 12-digit account id');
  }

  const dryRun = process.env.DRY_RUN?.toLowerCase() === 'true';

  return {
    families,
    timeoutMs,
    callerAccountId,
    dryRun,
  };
}
