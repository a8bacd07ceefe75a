import { GetParameterCommand, PutParameterCommand, SSMClient } from '@aws-sdk/client-ssm';
import { createChildLogger } from '@image-resolver/aws-powertools-util';

const logger = createChildLogger('publisher');

export type PublishOutcome = 'updated' | 'unchanged' | 'dry-run';

/**
 * Hands resolved image ids to the provisioning engine through SSM parameters.
 */
export class ImageIdPublisher {
  constructor(private readonly ssmClient: SSMClient) {}

  async getCurrentImageId(parameterName: string): Promise<string | undefined> {
    try {
      const response = await this.ssmClient.send(new GetParameterCommand({ Name: parameterName }));
      return response.Parameter?.Value;
    } catch (error) {
      if (error instanceof Error && error.name === 'ParameterNotFound') {
        logger.info(`Parameter ${parameterName} not found`);
        return undefined;
      }
      logger.error(`Error getting current image id from ${parameterName}`, { error });
      throw error;
    }
  }

  async publish(parameterName: string, imageId: string, dryRun: boolean): Promise<PublishOutcome> {
    const currentImageId = await this.getCurrentImageId(parameterName);

    if (currentImageId === imageId) {
      logger.info(`Parameter ${parameterName} already contains image ${imageId}`);
      return 'unchanged';
    }

    if (dryRun) {
      logger.info(`[DRY RUN] Would update parameter ${parameterName}`, { from: currentImageId, to: imageId });
      return 'dry-run';
    }

    await this.ssmClient.send(
      new PutParameterCommand({
        Name: parameterName,
        Value: imageId,
        Type: 'String',
        DataType: 'aws:ec2:image',
        Overwrite: true,
      }),
    );

    logger.info(`Updated parameter ${parameterName}`, { from: currentImageId, to: imageId });
    return 'updated';
  }
}
