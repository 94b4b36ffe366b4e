import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import { SqlDeploymentInfrastructure } from './constructs/SqlDeploymentInfrastructure';
import {
  DEFAULT_SQL_DEPLOYMENT_INFRASTRUCTURE_CONFIG,
  SqlDeploymentInfrastructureConfig,
} from './constructs/SqlDeploymentInfrastructureConfig';

export interface SqlDeploymentStackProps extends cdk.StackProps {
  readonly config?: SqlDeploymentInfrastructureConfig;
}

function requireContext(scope: Construct, key: string): string {
  const value: unknown = scope.node.tryGetContext(key);
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(
      `[SqlDeploymentStack] Missing required context: ${key}. Pass it with -c ${key}=... or in cdk.json.`
    );
  }
  return value;
}

function isExecutorMode(value: unknown): value is 'postgres' | 'dry-run' {
  return value === 'postgres' || value === 'dry-run';
}

/**
 * Context: notifyEmailTo, notifyEmailFrom (required), dbSecretName (postgres mode),
 * executorMode ('postgres' | 'dry-run').
 */
export class SqlDeploymentStack extends cdk.Stack {
  public readonly deployment: SqlDeploymentInfrastructure;

  constructor(scope: Construct, id: string, props: SqlDeploymentStackProps = {}) {
    super(scope, id, props);

    const baseConfig = props.config ?? DEFAULT_SQL_DEPLOYMENT_INFRASTRUCTURE_CONFIG;
    const executorMode: unknown = this.node.tryGetContext('executorMode');
    const config: SqlDeploymentInfrastructureConfig =
      isExecutorMode(executorMode)
        ? { ...baseConfig, defaults: { ...baseConfig.defaults, executorMode } }
        : baseConfig;

    const dbSecretName: unknown = this.node.tryGetContext('dbSecretName');

    this.deployment = new SqlDeploymentInfrastructure(this, 'SqlDeployment', {
      notifyEmailTo: requireContext(this, 'notifyEmailTo'),
      notifyEmailFrom: requireContext(this, 'notifyEmailFrom'),
      dbSecretName: typeof dbSecretName === 'string' && dbSecretName ? dbSecretName : undefined,
      config,
    });

    new cdk.CfnOutput(this, 'DeploymentLedgerTableName', {
      value: this.deployment.deploymentLedgerTable.tableName,
    });
    new cdk.CfnOutput(this, 'SqlDeploymentFunctionName', {
      value: this.deployment.sqlDeploymentHandler.functionName,
    });
  }
}
