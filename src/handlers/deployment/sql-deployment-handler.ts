/**
 * SQL Deployment Handler
 *
 * Input: { files: [{ filename, content }] } (changed files from the VCS webhook).
 * Output: { status: 'NO_FILES' | 'COMPLETED' }. Per-script outcomes go to the
 * ledger table and the notification email only.
 */

import { Handler } from 'aws-lambda';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { SESClient } from '@aws-sdk/client-ses';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { getAWSClientConfig } from '../../utils/aws-client-config';
import { Logger } from '../../services/core/Logger';
import {
  DeploymentConfig,
  loadDeploymentConfig,
  orchestratorOptionsFromConfig,
  requireConfigValue,
} from '../../config/deploymentConfig';
import { SqlDeploymentOrchestrator } from '../../services/deployment/SqlDeploymentOrchestrator';
import { DeploymentLedgerService } from '../../services/ledger/DeploymentLedgerService';
import { SesNotificationService } from '../../services/notification/SesNotificationService';
import { PostgresScriptExecutor } from '../../services/execution/PostgresScriptExecutor';
import { DryRunScriptExecutor } from '../../services/execution/DryRunScriptExecutor';
import { IScriptExecutor } from '../../services/execution/IScriptExecutor';
import { InvalidEventError } from '../../types/DeploymentErrors';
import { SqlDeploymentResult } from '../../types/DeploymentTypes';
import { SqlDeploymentEventSchema, toScriptFiles } from './event-schema';

/**
 * Create handler function with dependency injection for testability
 */
export function createHandler(
  orchestrator: SqlDeploymentOrchestrator,
  logger: Logger
): Handler<unknown, SqlDeploymentResult> {
  return async (event: unknown) => {
    const validationResult = SqlDeploymentEventSchema.safeParse(event ?? {});
    if (!validationResult.success) {
      throw new InvalidEventError(
        `[SqlDeploymentHandler] Invalid event: ${validationResult.error.message}. ` +
        `Expected: { files: [{ filename: string, content: string }] }.`
      );
    }

    const files = toScriptFiles(validationResult.data);
    logger.info('SQL deployment batch received', { fileCount: files.length });

    const result = await orchestrator.run(files);
    logger.info('SQL deployment batch finished', { status: result.status });
    return result;
  };
}

/**
 * Production collaborators from config (DynamoDB ledger, SES notifier,
 * Postgres or dry-run executor).
 */
export function buildOrchestrator(config: DeploymentConfig, logger: Logger): SqlDeploymentOrchestrator {
  const clientConfig = getAWSClientConfig(config.region);
  const dynamoClient = DynamoDBDocumentClient.from(new DynamoDBClient(clientConfig), {
    marshallOptions: { removeUndefinedValues: true },
  });

  const ledger = new DeploymentLedgerService(dynamoClient, config.ledgerTableName, logger);
  const notifier = new SesNotificationService(
    new SESClient(clientConfig),
    requireConfigValue(config.notifyEmailFrom, 'NOTIFY_EMAIL_FROM'),
    requireConfigValue(config.notifyEmailTo, 'NOTIFY_EMAIL_TO'),
    logger
  );

  const executor: IScriptExecutor =
    config.executorMode === 'dry-run'
      ? new DryRunScriptExecutor(logger)
      : new PostgresScriptExecutor({
          secretsClient: new SecretsManagerClient(clientConfig),
          secretName: requireConfigValue(config.dbSecretName, 'DB_SECRET_NAME'),
          logger,
          statementTimeoutMs: config.scriptTimeoutMs,
        });

  return new SqlDeploymentOrchestrator({
    ledger,
    executor,
    notifier,
    logger,
    options: orchestratorOptionsFromConfig(config),
  });
}

const logger = new Logger('SqlDeploymentHandler');
const config = loadDeploymentConfig();

export const handler = createHandler(buildOrchestrator(config, logger), logger);
