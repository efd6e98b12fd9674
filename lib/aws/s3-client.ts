import { S3 } from '@aws-sdk/client-s3';
import { fromIni } from '@aws-sdk/credential-provider-ini';
import { fromEnv } from '@aws-sdk/credential-provider-env';
import * as log from '../util/log';

export interface S3ClientOptions {
  readonly region?: string;

  /**
   * Named profile from ~/.aws/config or ~/.aws/credentials
   */
  readonly profile?: string;
}

/**
 * Make an S3 client
 *
 * Uses the given profile if there is one, otherwise credentials from the
 * environment if $AWS_ACCESS_KEY_ID is set, otherwise accesses S3 anonymously.
 */
export function makeS3Client(options: S3ClientOptions = {}): S3 {
  const region = options.region ?? process.env.AWS_REGION ?? 'us-east-1';

  if (options.profile) {
    log.debug(`Using S3 in '${region}' with profile '${options.profile}'`);
    return new S3({ region, credentials: fromIni({ profile: options.profile }) });
  }

  if (process.env.AWS_ACCESS_KEY_ID) {
    log.debug(`Using S3 in '${region}' with $AWS_ACCESS_KEY_ID credentials`);
    return new S3({ region, credentials: fromEnv() });
  }

  log.debug(`Using S3 in '${region}' anonymously`);
  return new S3({
    region,
    credentials: { accessKeyId: '', secretAccessKey: '' },
    // Unsigned requests, for public buckets
    signer: { sign: (request) => Promise.resolve(request) },
  });
}
