import { DescribeImagesCommand, EC2Client, type DescribeImagesCommandInput, type Filter, type Image } from '@aws-sdk/client-ec2';
import { createChildLogger } from '@image-resolver/aws-powertools-util';

import type { OwnerScope } from './query';

const logger = createChildLogger('catalog');

export interface ImageRecord {
  readonly id: string;
  readonly name: string;
  /** Account id of the owner. */
  readonly owner: string;
  /** Set for images published by `amazon` or `aws-marketplace`. */
  readonly ownerAlias?: string;
  readonly createdAt: Date;
}

export interface ImageListRequest {
  ownerScope: OwnerScope;
  /** When set, the catalog may return only images whose name starts with it. */
  namePrefix?: string;
  signal?: AbortSignal;
}

/**
 * The single capability the resolver needs from a cloud provider: list the
 * images visible to the caller for an owner scope.
 */
export interface ImageCatalog {
  listImages(request: ImageListRequest): Promise<ImageRecord[]>;
}

export const DESCRIBE_IMAGES_PAGE_SIZE = 1000;

export class Ec2ImageCatalog implements ImageCatalog {
  constructor(private readonly ec2Client: EC2Client) {}

  async listImages(request: ImageListRequest): Promise<ImageRecord[]> {
    const filters: Filter[] = [];
    if (request.namePrefix) {
      filters.push({ Name: 'name', Values: [`${request.namePrefix}*`] });
    }

    const input: DescribeImagesCommandInput = {
      Owners: [request.ownerScope],
      Filters: filters.length > 0 ? filters : undefined,
      MaxResults: DESCRIBE_IMAGES_PAGE_SIZE,
    };
    logger.debug('Describing images', { input });

    const records: ImageRecord[] = [];
    let nextToken: string | undefined;
    do {
      const response = await this.ec2Client.send(new DescribeImagesCommand({ ...input, NextToken: nextToken }), {
        abortSignal: request.signal,
      });

      for (const image of response.Images ?? []) {
        const record = toImageRecord(image);
        if (record) {
          records.push(record);
        } else {
          logger.warn(`Skipping image ${image.ImageId ?? '<no id>'} with incomplete catalog data`);
        }
      }

      nextToken = response.NextToken;
    } while (nextToken);

    logger.debug(`Found #${records.length} images owned by ${request.ownerScope}`);
    return records;
  }
}

function toImageRecord(image: Image): ImageRecord | undefined {
  if (!image.ImageId || !image.Name || !image.OwnerId || !image.CreationDate) {
    return undefined;
  }
  const createdAt = new Date(image.CreationDate);
  if (Number.isNaN(createdAt.getTime())) {
    return undefined;
  }
  return {
    id: image.ImageId,
    name: image.Name,
    owner: image.OwnerId,
    ownerAlias: image.ImageOwnerAlias,
    createdAt,
  };
}
