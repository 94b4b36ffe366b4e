/**
 * Unit tests for deployment configuration loading
 */

import {
  loadDeploymentConfig,
  orchestratorOptionsFromConfig,
  requireConfigValue,
} from '../../../config/deploymentConfig';
import { ConfigurationError } from '../../../types/DeploymentErrors';

describe('loadDeploymentConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadDeploymentConfig({})).toEqual({
      region: 'us-west-2',
      maxScriptAgeMonths: 12,
      ledgerTableName: 'sql-deployments',
      notifyEmailTo: undefined,
      notifyEmailFrom: undefined,
      dbSecretName: undefined,
      executorMode: 'postgres',
      deploymentRootSegment: 'deployment',
      deploymentIdPattern: /^SCT-/,
      ledgerFailOpen: true,
      notifyOnAlreadyExecuted: true,
      scriptTimeoutMs: 0,
    });
  });

  it('reads every variable', () => {
    const config = loadDeploymentConfig({
      AWS_REGION: 'eu-central-1',
      MAX_SQL_AGE_MONTHS: '6',
      DEPLOYMENT_LEDGER_TABLE_NAME: 'ledger-test',
      NOTIFY_EMAIL_TO: 'dba-team@example.com',
      NOTIFY_EMAIL_FROM: 'deploy-bot@example.com',
      DB_SECRET_NAME: 'test/db-secret',
      SQL_EXECUTOR_MODE: 'dry-run',
      DEPLOYMENT_ROOT_SEGMENT: 'releases',
      DEPLOYMENT_ID_PATTERN: '^REL-\\d+$',
      LEDGER_FAIL_OPEN: 'false',
      NOTIFY_ON_ALREADY_EXECUTED: '0',
      SCRIPT_TIMEOUT_MS: '30000',
    });

    expect(config).toEqual({
      region: 'eu-central-1',
      maxScriptAgeMonths: 6,
      ledgerTableName: 'ledger-test',
      notifyEmailTo: 'dba-team@example.com',
      notifyEmailFrom: 'deploy-bot@example.com',
      dbSecretName: 'test/db-secret',
      executorMode: 'dry-run',
      deploymentRootSegment: 'releases',
      deploymentIdPattern: /^REL-\d+$/,
      ledgerFailOpen: false,
      notifyOnAlreadyExecuted: false,
      scriptTimeoutMs: 30000,
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadDeploymentConfig({
      MAX_SQL_AGE_MONTHS: '',
      NOTIFY_EMAIL_TO: '',
      SQL_EXECUTOR_MODE: '',
      LEDGER_FAIL_OPEN: '',
    });

    expect(config.maxScriptAgeMonths).toBe(12);
    expect(config.notifyEmailTo).toBeUndefined();
    expect(config.executorMode).toBe('postgres');
    expect(config.ledgerFailOpen).toBe(true);
  });

  it('rejects a non-positive age limit', () => {
    expect(() => loadDeploymentConfig({ MAX_SQL_AGE_MONTHS: '0' })).toThrow(
      'Invalid deployment configuration: MAX_SQL_AGE_MONTHS: MAX_SQL_AGE_MONTHS must be a positive integer'
    );
  });

  it('rejects an unknown executor mode', () => {
    expect(() => loadDeploymentConfig({ SQL_EXECUTOR_MODE: 'mysql' })).toThrow(ConfigurationError);
  });

  it('rejects an invalid id pattern', () => {
    expect(() => loadDeploymentConfig({ DEPLOYMENT_ID_PATTERN: '([' })).toThrow(
      'Invalid deployment configuration: DEPLOYMENT_ID_PATTERN: DEPLOYMENT_ID_PATTERN must be a valid regular expression'
    );
  });

  it('rejects an unrecognised boolean flag', () => {
    expect(() => loadDeploymentConfig({ LEDGER_FAIL_OPEN: 'maybe' })).toThrow(/LEDGER_FAIL_OPEN/);
  });
});

describe('requireConfigValue', () => {
  it('returns a present value', () => {
    expect(requireConfigValue('test/db-secret', 'DB_SECRET_NAME')).toBe('test/db-secret');
  });

  it('throws ConfigurationError naming the variable', () => {
    expect(() => requireConfigValue(undefined, 'DB_SECRET_NAME')).toThrow(
      'Missing required environment variable: DB_SECRET_NAME.'
    );
  });
});

describe('orchestratorOptionsFromConfig', () => {
  it('maps config to orchestrator options', () => {
    const config = loadDeploymentConfig({ MAX_SQL_AGE_MONTHS: '3', SCRIPT_TIMEOUT_MS: '500' });

    expect(orchestratorOptionsFromConfig(config)).toEqual({
      maxScriptAgeMonths: 3,
      pathRules: { deploymentRoot: 'deployment', deploymentIdPattern: /^SCT-/ },
      ledgerFailOpen: true,
      notifyOnAlreadyExecuted: true,
      scriptTimeoutMs: 500,
    });
  });
});
