export { Ec2ImageCatalog, DESCRIBE_IMAGES_PAGE_SIZE } from './catalog';
export type { ImageCatalog, ImageListRequest, ImageRecord } from './catalog';
export { Deadline } from './deadline';
export {
  CancelledError,
  ImageResolutionError,
  InvalidQueryError,
  NotFoundError,
  ProviderError,
  TimedOutError,
} from './errors';
export { ImageIdPublisher } from './publisher';
export type { PublishOutcome } from './publisher';
export { compileQuery, literalPrefix, OWNER_ALIASES } from './query';
export type { CompiledQuery, ImageQuery, OwnerAlias, OwnerScope } from './query';
export { compareByRecency, ImageResolver, ownerMatches, selectMostRecent } from './resolver';
export type { FamilyResolution, ImageResolverOptions, ResolveOptions, ResolvedImage } from './resolver';
