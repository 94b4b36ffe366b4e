/**
 * SQL Deployment Infrastructure Configuration
 */

export interface SqlDeploymentInfrastructureConfig {
  readonly tableNames: {
    readonly deploymentLedger: string;
  };
  readonly functionNames: {
    readonly sqlDeployment: string;
  };
  readonly defaults: {
    readonly timeoutSeconds: number;
    readonly memorySize: number;
    readonly maxScriptAgeMonths: number;
    readonly scriptTimeoutMs: number;
    readonly executorMode: 'postgres' | 'dry-run';
    readonly logLevel: string;
  };
}

export const DEFAULT_SQL_DEPLOYMENT_INFRASTRUCTURE_CONFIG: SqlDeploymentInfrastructureConfig = {
  tableNames: {
    deploymentLedger: 'sql-deployments',
  },
  functionNames: {
    sqlDeployment: 'sql-deploy-runner',
  },
  defaults: {
    timeoutSeconds: 900,
    memorySize: 512,
    maxScriptAgeMonths: 12,
    scriptTimeoutMs: 600_000,
    executorMode: 'postgres',
    logLevel: 'info',
  },
};
