import { EC2Client } from '@aws-sdk/client-ec2';
import { SSMClient } from '@aws-sdk/client-ssm';
import { getTracedAWSV3Client, logger, setContext } from '@image-resolver/aws-powertools-util';
import type { Context } from 'aws-lambda';

import { Ec2ImageCatalog } from './catalog';
import { getConfig } from './config';
import { ImageIdPublisher, type PublishOutcome } from './publisher';
import { ImageResolver } from './resolver';

const ec2Client = getTracedAWSV3Client(new EC2Client({}));
const ssmClient = getTracedAWSV3Client(new SSMClient({}));

export interface FamilyReport {
  family: string;
  imageId: string;
  imageName: string;
  createdAt: string;
  publish: PublishOutcome | 'skipped';
}

export interface ResolutionReport {
  dryRun: boolean;
  families: FamilyReport[];
}

export const handler = async (_event: unknown, context: Context): Promise<ResolutionReport> => {
  try {
    setContext(context, 'image-resolver');
    const config = getConfig();

    logger.info('Starting image resolution', { config });

    const resolver = new ImageResolver(new Ec2ImageCatalog(ec2Client), {
      callerAccountId: config.callerAccountId,
      timeoutMs: config.timeoutMs,
    });
    const publisher = new ImageIdPublisher(ssmClient);

    const queries = Object.fromEntries(
      Object.entries(config.families).map(([family, familyConfig]) => [family, familyConfig.query]),
    );
    const results = await resolver.resolveAll(queries);

    const reports: FamilyReport[] = [];
    const failedFamilies: string[] = [];
    const unpublishedFamilies: string[] = [];
    for (const result of results) {
      if (result.status === 'failed') {
        logger.error(`Failed to resolve image family ${result.family}`, { error: result.error });
        failedFamilies.push(result.family);
        continue;
      }

      const { image } = result.resolved;
      logger.info(`Resolved image family ${result.family}`, { imageId: image.id, imageName: image.name });

      const parameterName = config.families[result.family].ssmParameterName;
      let publish: PublishOutcome | 'skipped' = 'skipped';
      if (parameterName) {
        try {
          publish = await publisher.publish(parameterName, image.id, config.dryRun);
        } catch (error) {
          logger.error(`Failed to publish image family ${result.family} to ${parameterName}`, { error });
          unpublishedFamilies.push(result.family);
          continue;
        }
      }

      reports.push({
        family: result.family,
        imageId: image.id,
        imageName: image.name,
        createdAt: image.createdAt.toISOString(),
        publish,
      });
    }

    const failures: string[] = [];
    if (failedFamilies.length > 0) {
      failures.push(`Failed to resolve image families: ${failedFamilies.join(', ')}`);
    }
    if (unpublishedFamilies.length > 0) {
      failures.push(`Failed to publish image families: ${unpublishedFamilies.join(', ')}`);
    }
    if (failures.length > 0) {
      throw new Error(failures.join('; '));
    }

    const report = { dryRun: config.dryRun, families: reports };
    logger.info('Image resolution completed successfully', { report });
    return report;
  } catch (error) {
    logger.error('Error in image resolution process', { error });
    throw error;
  }
};
