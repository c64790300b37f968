/**
 * AWS credentials for the ECS client.
 *
 * Optionally assumes an IAM role through STS and reports the identity the
 * exporter runs as.
 */

import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { fromTemporaryCredentials } from '@aws-sdk/credential-providers';
import type { RoleConfig } from '@/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('ecs-exporter:credentials');

export type CredentialsProvider = ReturnType<typeof fromTemporaryCredentials>;

/**
 * Creates a provider returning temporary credentials of the given role.
 *
 * The base credentials come from the default chain. The SDK clients given
 * this provider cache its credentials and refresh them shortly before they
 * expire.
 *
 * @param role - Role to assume
 * @param region - Region of the STS endpoint, if not the default
 */
export function createAssumeRoleProvider(role: RoleConfig, region?: string): CredentialsProvider {
  logger.debug({ roleArn: role.arn, sessionName: role.sessionName }, 'Using role credentials');

  return fromTemporaryCredentials({
    params: {
      RoleArn: role.arn,
      RoleSessionName: role.sessionName,
      ExternalId: role.externalId,
    },
    clientConfig: { region },
  });
}

/**
 * Logs the account and ARN the exporter is running as.
 *
 * Failures are logged as a warning only; scrapes will report them anyway.
 *
 * @returns The caller ARN, or null if it could not be determined
 */
export async function logCallerIdentity(stsClient: STSClient): Promise<string | null> {
  try {
    const response = await stsClient.send(new GetCallerIdentityCommand({}));

    if (!response.Account || !response.Arn) {
      logger.warn('GetCallerIdentity returned incomplete response');
      return null;
    }

    logger.info({ account: response.Account, arn: response.Arn }, 'Using AWS identity');
    return response.Arn;
  } catch (error) {
    logger.warn({ error: String(error) }, 'Failed to verify AWS credentials');
    return null;
  }
}
