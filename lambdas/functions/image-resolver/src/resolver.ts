import { createChildLogger } from '@image-resolver/aws-powertools-util';

import type { ImageCatalog, ImageRecord } from './catalog';
import { Deadline } from './deadline';
import { ImageResolutionError, NotFoundError, ProviderError } from './errors';
import { compileQuery, isAccountId, type ImageQuery, type OwnerScope } from './query';

const logger = createChildLogger('resolver');

export interface ResolvedImage {
  readonly query: ImageQuery;
  readonly image: ImageRecord;
  /** Number of catalog records that matched owner scope and name pattern. */
  readonly candidates: number;
}

export interface ImageResolverOptions {
  /** Account id of the caller, used to check the `self` owner scope client-side. */
  callerAccountId?: string;
  /** Default timeout for every resolution, overridable per call. */
  timeoutMs?: number;
}

export interface ResolveOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type FamilyResolution =
  | { family: string; status: 'resolved'; resolved: ResolvedImage }
  | { family: string; status: 'failed'; error: ImageResolutionError };

/**
 * Orders records most recent first. Records created at the same instant are
 * ordered by ascending id so the pick never depends on catalog order.
 */
export function compareByRecency(a: ImageRecord, b: ImageRecord): number {
  const delta = b.createdAt.getTime() - a.createdAt.getTime();
  if (delta !== 0) {
    return delta;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

export function selectMostRecent(records: readonly ImageRecord[]): ImageRecord | undefined {
  return records.reduce<ImageRecord | undefined>(
    (best, record) => (best === undefined || compareByRecency(record, best) < 0 ? record : best),
    undefined,
  );
}

export function ownerMatches(ownerScope: OwnerScope, record: ImageRecord, callerAccountId?: string): boolean {
  if (isAccountId(ownerScope)) {
    return record.owner === ownerScope;
  }
  if (ownerScope === 'self') {
    return callerAccountId === undefined || record.owner === callerAccountId;
  }
  return record.ownerAlias === ownerScope;
}

export class ImageResolver {
  constructor(
    private readonly catalog: ImageCatalog,
    private readonly options: ImageResolverOptions = {},
  ) {}

  /**
   * Resolve a query to the most recently created image owned by its scope whose
   * name matches its pattern.
   *
   * Rejects with `NotFoundError` when nothing matches, `ProviderError` when the
   * catalog query fails, `CancelledError` or `TimedOutError` when the signal or
   * timeout ends the call first, and `InvalidQueryError` for a malformed query.
   */
  async resolve(query: ImageQuery, options: ResolveOptions = {}): Promise<ResolvedImage> {
    const compiled = compileQuery(query);
    const deadline = new Deadline(options.signal, options.timeoutMs ?? this.options.timeoutMs);

    let records: ImageRecord[];
    try {
      records = await deadline.run((signal) =>
        this.catalog.listImages({ ownerScope: query.ownerScope, namePrefix: compiled.namePrefix, signal }),
      );
    } catch (error) {
      if (error instanceof ImageResolutionError) {
        throw error;
      }
      logger.error('Image catalog query failed', { error, query });
      throw ProviderError.from(error);
    } finally {
      deadline.dispose();
    }

    const matches = records.filter(
      (record) =>
        ownerMatches(query.ownerScope, record, this.options.callerAccountId) && compiled.matcher.test(record.name),
    );
    const image = selectMostRecent(matches);
    if (!image) {
      logger.info('No image matches query', { query, listed: records.length });
      throw new NotFoundError(query);
    }

    logger.debug('Resolved image', { query, imageId: image.id, candidates: matches.length });
    return { query, image, candidates: matches.length };
  }

  /**
   * Resolve several named families in parallel. Each outcome is reported on its
   * own; one family failing does not affect the others.
   */
  async resolveAll(
    families: Readonly<Record<string, ImageQuery>>,
    options: ResolveOptions = {},
  ): Promise<FamilyResolution[]> {
    const entries = Object.entries(families);
    const settled = await Promise.allSettled(entries.map(([, query]) => this.resolve(query, options)));

    return settled.map((outcome, index): FamilyResolution => {
      const family = entries[index][0];
      if (outcome.status === 'fulfilled') {
        return { family, status: 'resolved', resolved: outcome.value };
      }
      const reason: unknown = outcome.reason;
      const error = reason instanceof ImageResolutionError ? reason : ProviderError.from(reason);
      return { family, status: 'failed', error };
    });
  }
}
