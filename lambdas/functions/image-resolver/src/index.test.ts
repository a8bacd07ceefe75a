import { describe, it, expect, vi } from 'vitest';

import { ImageResolver, NotFoundError, type ImageCatalog, type ImageRecord } from './index';

vi.mock('@image-resolver/aws-powertools-util', () => {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger, createChildLogger: () => logger };
});

function catalogOf(records: ImageRecord[]): ImageCatalog {
  return { listImages: async () => records };
}

describe('image resolver package', () => {
  const records: ImageRecord[] = [
    { id: 'ami-0001', name: 'bastion-2024-01', owner: '111122223333', createdAt: new Date('2024-01-10T00:00:00Z') },
    { id: 'ami-0002', name: 'bastion-2024-02', owner: '111122223333', createdAt: new Date('2024-02-10T00:00:00Z') },
    { id: 'ami-0003', name: 'other-x', owner: '111122223333', createdAt: new Date('2024-03-10T00:00:00Z') },
  ];

  it('resolves the newest bastion image owned by the caller', async () => {
    const resolver = new ImageResolver(catalogOf(records), { callerAccountId: '111122223333' });

    const resolved = await resolver.resolve({ ownerScope: 'self', namePattern: '^bastion.*' });

    expect(resolved.image.name).toBe('bastion-2024-02');
  });

  it('reports a missing family as NotFoundError', async () => {
    const resolver = new ImageResolver(catalogOf(records), { callerAccountId: '999988887777' });

    await expect(resolver.resolve({ ownerScope: 'self', namePattern: '^bastion.*' })).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
