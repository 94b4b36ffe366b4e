/**
 * AWS Client Configuration Helper
 *
 * Builds AWS SDK v3 client configuration with static credentials where the
 * environment (or a named profile) provides them, so local runs and Jest do not
 * go through the default provider chain.
 *
 * Priority:
 * 1. AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY
 * 2. AWS_PROFILE (read from ~/.aws/credentials)
 * 3. [default] profile
 * 4. Default provider chain (Lambda execution role)
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export interface AWSCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface AWSClientConfig {
  region?: string;
  credentials?: AWSCredentials;
}

/**
 * Read one profile from ~/.aws/credentials. Returns null when the file or the
 * profile's key pair is missing.
 */
export function readCredentialsFromProfile(
  profileName: string,
  credentialsPath: string = path.join(os.homedir(), '.aws', 'credentials')
): AWSCredentials | null {
  if (!fs.existsSync(credentialsPath)) {
    return null;
  }

  const lines = fs.readFileSync(credentialsPath, 'utf-8').split('\n');

  let inProfile = false;
  let accessKeyId: string | undefined;
  let secretAccessKey: string | undefined;
  let sessionToken: string | undefined;

  for (const line of lines) {
    const trimmed = line.trim();

    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      if (inProfile) break;
      inProfile = trimmed === `[${profileName}]`;
      continue;
    }

    if (!inProfile) continue;

    const [rawKey, ...rest] = trimmed.split('=');
    const value = rest.join('=').trim();
    switch (rawKey?.trim()) {
      case 'aws_access_key_id':
        accessKeyId = value;
        break;
      case 'aws_secret_access_key':
        secretAccessKey = value;
        break;
      case 'aws_session_token':
        sessionToken = value;
        break;
    }
  }

  if (accessKeyId && secretAccessKey) {
    return {
      accessKeyId,
      secretAccessKey,
      ...(sessionToken ? { sessionToken } : {}),
    };
  }

  return null;
}

export function getAWSClientConfig(region?: string): AWSClientConfig {
  const config: AWSClientConfig = { region: region || process.env.AWS_REGION };

  if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID,
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
      ...(process.env.AWS_SESSION_TOKEN ? { sessionToken: process.env.AWS_SESSION_TOKEN } : {}),
    };
    return config;
  }

  // Inside Lambda the execution role is the only source we want
  if (process.env.AWS_LAMBDA_FUNCTION_NAME) {
    return config;
  }

  const profileCredentials =
    (process.env.AWS_PROFILE && readCredentialsFromProfile(process.env.AWS_PROFILE)) ||
    readCredentialsFromProfile('default');
  if (profileCredentials) {
    config.credentials = profileCredentials;
  }

  return config;
}
