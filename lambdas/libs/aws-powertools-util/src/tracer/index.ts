import { Tracer } from '@aws-lambda-powertools/tracer';

const tracer = new Tracer({
  serviceName: process.env.SERVICE_NAME || 'image-resolver',
});

function getTracedAWSV3Client<T>(client: T): T {
  return tracer.captureAWSv3Client(client);
}
export { tracer, getTracedAWSV3Client };
