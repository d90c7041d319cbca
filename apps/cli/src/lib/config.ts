import { z } from 'zod';
import { LOG_LEVELS, enumVar, loadEnvConfig, stringVar, type EnvSource, type LogLevel } from '@s3t/shared';

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const envSchema = z.object({
  AWS_PROFILE: stringVar({ description: 'AWS profile' }),
  AWS_REGION: stringVar({ description: 'AWS region' }),
  S3T_ENDPOINT: stringVar({ description: 'S3 Tables endpoint URL', pattern: /^https?:\/\/\S+$/ }),
  S3T_LOG_LEVEL: enumVar(LOG_LEVELS, { defaultValue: DEFAULT_LOG_LEVEL, description: 'log level' })
});

export type GlobalOptions = {
  profile?: string;
  region?: string;
  endpoint?: string;
  logLevel?: string;
};

export type CliConfig = {
  profile?: string;
  region?: string;
  endpoint?: string;
  logLevel: LogLevel;
};

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Flags win over the environment. Flag values go through the same schema so a
 * bad `--log-level` is reported the way a bad `S3T_LOG_LEVEL` is.
 */
export function resolveCliConfig(options: GlobalOptions, env: EnvSource = process.env): CliConfig {
  const merged: EnvSource = {
    AWS_PROFILE: nonEmpty(options.profile) ?? env.AWS_PROFILE,
    AWS_REGION: nonEmpty(options.region) ?? env.AWS_REGION ?? env.AWS_DEFAULT_REGION,
    S3T_ENDPOINT: nonEmpty(options.endpoint) ?? env.S3T_ENDPOINT,
    S3T_LOG_LEVEL: nonEmpty(options.logLevel) ?? env.S3T_LOG_LEVEL
  };

  const parsed = loadEnvConfig(envSchema, { env: merged, context: 's3t' });

  return {
    profile: parsed.AWS_PROFILE,
    region: parsed.AWS_REGION,
    endpoint: parsed.S3T_ENDPOINT,
    logLevel: parsed.S3T_LOG_LEVEL ?? DEFAULT_LOG_LEVEL
  };
}
