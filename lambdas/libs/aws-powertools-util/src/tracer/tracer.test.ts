import { EC2Client } from '@aws-sdk/client-ec2';
import { describe, test, expect } from 'vitest';

import { getTracedAWSV3Client, tracer } from './index';

describe('Tracer outside of Lambda.', () => {
  test('Should be disabled and hand back the client untouched.', () => {
    const client = new EC2Client({ region: 'eu-west-1' });

    expect(tracer.isTracingEnabled()).toBe(false);
    expect(getTracedAWSV3Client(client)).toBe(client);
  });
});
