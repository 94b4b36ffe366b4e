/**
 * SQL Deployment Infrastructure
 *
 * Ledger table (pk deployment_id, sk script_name), the deployment Lambda, and
 * its grants: ledger read/write, DB secret read, SES send.
 */

import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdaNodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import {
  SqlDeploymentInfrastructureConfig,
  DEFAULT_SQL_DEPLOYMENT_INFRASTRUCTURE_CONFIG,
} from './SqlDeploymentInfrastructureConfig';

export interface SqlDeploymentInfrastructureProps {
  readonly notifyEmailTo: string;
  readonly notifyEmailFrom: string;
  /** Required unless config.defaults.executorMode is 'dry-run'. */
  readonly dbSecretName?: string;
  readonly config?: SqlDeploymentInfrastructureConfig;
}

export class SqlDeploymentInfrastructure extends Construct {
  public readonly deploymentLedgerTable: dynamodb.Table;
  public readonly sqlDeploymentHandler: lambda.Function;

  constructor(scope: Construct, id: string, props: SqlDeploymentInfrastructureProps) {
    super(scope, id);

    const config = props.config ?? DEFAULT_SQL_DEPLOYMENT_INFRASTRUCTURE_CONFIG;
    const { defaults } = config;

    if (defaults.executorMode === 'postgres' && !props.dbSecretName) {
      throw new Error(
        '[SqlDeploymentInfrastructure] dbSecretName is required when executorMode is postgres'
      );
    }

    this.deploymentLedgerTable = new dynamodb.Table(this, 'DeploymentLedgerTable', {
      tableName: config.tableNames.deploymentLedger,
      partitionKey: { name: 'deployment_id', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'script_name', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecoverySpecification: {
        pointInTimeRecoveryEnabled: true,
      },
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    this.sqlDeploymentHandler = new lambdaNodejs.NodejsFunction(this, 'SqlDeploymentHandler', {
      functionName: config.functionNames.sqlDeployment,
      entry: path.join(__dirname, '../../handlers/deployment/sql-deployment-handler.ts'),
      handler: 'handler',
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.seconds(defaults.timeoutSeconds),
      memorySize: defaults.memorySize,
      // Sequential by design: overlapping batches could race on the same ledger key
      reservedConcurrentExecutions: 1,
      bundling: {
        externalModules: ['@aws-sdk/*', 'pg-native'],
      },
      environment: {
        DEPLOYMENT_LEDGER_TABLE_NAME: this.deploymentLedgerTable.tableName,
        MAX_SQL_AGE_MONTHS: String(defaults.maxScriptAgeMonths),
        SCRIPT_TIMEOUT_MS: String(defaults.scriptTimeoutMs),
        SQL_EXECUTOR_MODE: defaults.executorMode,
        NOTIFY_EMAIL_TO: props.notifyEmailTo,
        NOTIFY_EMAIL_FROM: props.notifyEmailFrom,
        LOG_LEVEL: defaults.logLevel,
        ...(props.dbSecretName ? { DB_SECRET_NAME: props.dbSecretName } : {}),
      },
    });

    this.deploymentLedgerTable.grantReadWriteData(this.sqlDeploymentHandler);

    if (props.dbSecretName) {
      const dbSecret = secretsmanager.Secret.fromSecretNameV2(this, 'DbSecret', props.dbSecretName);
      dbSecret.grantRead(this.sqlDeploymentHandler);
    }

    this.sqlDeploymentHandler.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['ses:SendEmail'],
        resources: ['*'],
        conditions: {
          StringEquals: { 'ses:FromAddress': props.notifyEmailFrom },
        },
      })
    );
  }
}
