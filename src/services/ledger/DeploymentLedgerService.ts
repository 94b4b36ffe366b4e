import { DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { ExecutionRecord, IgnoreReasons, isTerminalRecord } from '../../types/DeploymentTypes';
import { IExecutionLedger } from './IExecutionLedger';
import { Logger } from '../core/Logger';

/**
 * DeploymentLedgerService - DynamoDB execution ledger
 *
 * Table: pk deployment_id, sk script_name; one item per script, overwritten on
 * every decision except that a SUCCESS (or "Already executed") item is only
 * ever replaced by another terminal record.
 */
export class DeploymentLedgerService implements IExecutionLedger {
  constructor(
    private dynamoClient: DynamoDBDocumentClient,
    private tableName: string,
    private logger: Logger
  ) {}

  async lookup(deploymentId: string, scriptName: string): Promise<boolean> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { deployment_id: deploymentId, script_name: scriptName },
        ConsistentRead: true,
      })
    );

    const item = result.Item;
    const found = isTerminalRecord(
      item && {
        status: item.status,
        failure_reason: item.failure_reason,
      }
    );
    this.logger.debug('Ledger lookup', {
      deploymentId,
      scriptName,
      existingStatus: item?.status,
      found,
    });
    return found;
  }

  async put(record: ExecutionRecord): Promise<void> {
    const guard = isTerminalRecord(record)
      ? {}
      : {
          ConditionExpression:
            'attribute_not_exists(deployment_id) OR NOT (#status = :success OR (#status = :ignored AND #reason = :alreadyExecuted))',
          ExpressionAttributeNames: { '#status': 'status', '#reason': 'failure_reason' },
          ExpressionAttributeValues: {
            ':success': 'SUCCESS',
            ':ignored': 'IGNORED',
            ':alreadyExecuted': IgnoreReasons.ALREADY_EXECUTED,
          },
        };

    try {
      await this.dynamoClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { ...record },
          ...guard,
        })
      );
      this.logger.debug('Ledger record written', {
        deploymentId: record.deployment_id,
        scriptName: record.script_name,
        status: record.status,
      });
    } catch (error) {
      const name = error && typeof error === 'object' && 'name' in error ? error.name : '';
      if (name === 'ConditionalCheckFailedException') {
        this.logger.info('Kept terminal ledger record', {
          deploymentId: record.deployment_id,
          scriptName: record.script_name,
          droppedStatus: record.status,
          droppedReason: record.failure_reason,
        });
        return;
      }
      this.logger.error('Failed to write ledger record', {
        deploymentId: record.deployment_id,
        scriptName: record.script_name,
        status: record.status,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
