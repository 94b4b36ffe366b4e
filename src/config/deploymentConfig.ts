/**
 * SQL deployment config: read once from the environment when the handler module loads.
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/DeploymentErrors';
import type { SqlDeploymentOrchestratorOptions } from '../services/deployment/SqlDeploymentOrchestrator';

export type SqlExecutorMode = 'postgres' | 'dry-run';

export interface DeploymentConfig {
  region: string;
  maxScriptAgeMonths: number;
  ledgerTableName: string;
  notifyEmailTo?: string;
  notifyEmailFrom?: string;
  dbSecretName?: string;
  executorMode: SqlExecutorMode;
  deploymentRootSegment: string;
  deploymentIdPattern: RegExp;
  ledgerFailOpen: boolean;
  notifyOnAlreadyExecuted: boolean;
  /** 0 disables the per-script timeout. */
  scriptTimeoutMs: number;
}

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    (val) => {
      if (val === '' || val == null) return fallback;
      if (val === 'true' || val === '1') return true;
      if (val === 'false' || val === '0') return false;
      return val;
    },
    z.boolean()
  );

/** Lambda console leaves cleared variables as ''; treat them as unset. */
const unsetIfEmpty = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === '' ? undefined : val), schema);

const optionalString = unsetIfEmpty(z.string().optional());

const DeploymentEnvSchema = z.object({
  AWS_REGION: unsetIfEmpty(z.string().min(1).default('us-west-2')),
  MAX_SQL_AGE_MONTHS: unsetIfEmpty(
    z.coerce.number().int().positive('MAX_SQL_AGE_MONTHS must be a positive integer').default(12)
  ),
  DEPLOYMENT_LEDGER_TABLE_NAME: unsetIfEmpty(z.string().min(1).default('sql-deployments')),
  NOTIFY_EMAIL_TO: optionalString,
  NOTIFY_EMAIL_FROM: optionalString,
  DB_SECRET_NAME: optionalString,
  SQL_EXECUTOR_MODE: unsetIfEmpty(z.enum(['postgres', 'dry-run']).default('postgres')),
  DEPLOYMENT_ROOT_SEGMENT: unsetIfEmpty(z.string().min(1).default('deployment')),
  DEPLOYMENT_ID_PATTERN: unsetIfEmpty(z.string().min(1).default('^SCT-')).refine(
    (val) => {
      try {
        new RegExp(val);
        return true;
      } catch {
        return false;
      }
    },
    { message: 'DEPLOYMENT_ID_PATTERN must be a valid regular expression' }
  ),
  LEDGER_FAIL_OPEN: booleanFlag(true),
  NOTIFY_ON_ALREADY_EXECUTED: booleanFlag(true),
  SCRIPT_TIMEOUT_MS: unsetIfEmpty(
    z.coerce.number().int().nonnegative('SCRIPT_TIMEOUT_MS must be >= 0').default(0)
  ),
});

/**
 * Parse deployment config from an environment map (defaults to process.env).
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadDeploymentConfig(
  env: Record<string, string | undefined> = process.env
): DeploymentConfig {
  const parsed = DeploymentEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid deployment configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    region: e.AWS_REGION,
    maxScriptAgeMonths: e.MAX_SQL_AGE_MONTHS,
    ledgerTableName: e.DEPLOYMENT_LEDGER_TABLE_NAME,
    notifyEmailTo: e.NOTIFY_EMAIL_TO,
    notifyEmailFrom: e.NOTIFY_EMAIL_FROM,
    dbSecretName: e.DB_SECRET_NAME,
    executorMode: e.SQL_EXECUTOR_MODE,
    deploymentRootSegment: e.DEPLOYMENT_ROOT_SEGMENT,
    deploymentIdPattern: new RegExp(e.DEPLOYMENT_ID_PATTERN),
    ledgerFailOpen: e.LEDGER_FAIL_OPEN,
    notifyOnAlreadyExecuted: e.NOTIFY_ON_ALREADY_EXECUTED,
    scriptTimeoutMs: e.SCRIPT_TIMEOUT_MS,
  };
}

/**
 * Required-at-wiring-time value (e.g. DB_SECRET_NAME only matters in postgres mode).
 */
export function requireConfigValue(value: string | undefined, envName: string): string {
  if (!value) {
    throw new ConfigurationError(
      `Missing required environment variable: ${envName}. ` +
      `Set it in the Lambda function configuration (see SqlDeploymentInfrastructure).`
    );
  }
  return value;
}

export function orchestratorOptionsFromConfig(config: DeploymentConfig): SqlDeploymentOrchestratorOptions {
  return {
    maxScriptAgeMonths: config.maxScriptAgeMonths,
    pathRules: {
      deploymentRoot: config.deploymentRootSegment,
      deploymentIdPattern: config.deploymentIdPattern,
    },
    ledgerFailOpen: config.ledgerFailOpen,
    notifyOnAlreadyExecuted: config.notifyOnAlreadyExecuted,
    scriptTimeoutMs: config.scriptTimeoutMs,
  };
}
