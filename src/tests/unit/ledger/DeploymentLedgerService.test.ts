/**
 * Unit tests for DeploymentLedgerService
 */

import { GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { mockDynamoDBDocumentClient, resetAllMocks } from '../../__mocks__/aws-sdk-clients';
import { DeploymentLedgerService } from '../../../services/ledger/DeploymentLedgerService';
import { Logger } from '../../../services/core/Logger';
import { ExecutionRecord } from '../../../types/DeploymentTypes';

jest.mock('@aws-sdk/lib-dynamodb', () => ({
  DynamoDBDocumentClient: { from: jest.fn(() => mockDynamoDBDocumentClient) },
  GetCommand: jest.fn(),
  PutCommand: jest.fn(),
}));

const logger = new Logger('DeploymentLedgerServiceTest');

describe('DeploymentLedgerService', () => {
  const tableName = 'test-sql-deployments';
  let service: DeploymentLedgerService;

  beforeEach(() => {
    resetAllMocks();
    jest.clearAllMocks();
    service = new DeploymentLedgerService(mockDynamoDBDocumentClient as any, tableName, logger);
  });

  describe('lookup', () => {
    it('reads the item by (deployment_id, script_name) with a consistent read', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({});

      await service.lookup('SCT-1', 'a_2024_01_01_v1.sql');

      expect(GetCommand).toHaveBeenCalledWith({
        TableName: tableName,
        Key: { deployment_id: 'SCT-1', script_name: 'a_2024_01_01_v1.sql' },
        ConsistentRead: true,
      });
    });

    it('returns true when a SUCCESS record exists', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({
        Item: { deployment_id: 'SCT-1', script_name: 'a.sql', status: 'SUCCESS' },
      });

      await expect(service.lookup('SCT-1', 'a.sql')).resolves.toBe(true);
    });

    it('returns false when only a non-success record exists', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({
        Item: { deployment_id: 'SCT-1', script_name: 'a.sql', status: 'FAILED' },
      });

      await expect(service.lookup('SCT-1', 'a.sql')).resolves.toBe(false);
    });

    it('returns true when an earlier run recorded an "Already executed" skip', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({
        Item: { deployment_id: 'SCT-1', script_name: 'a.sql', status: 'IGNORED', failure_reason: 'Already executed' },
      });

      await expect(service.lookup('SCT-1', 'a.sql')).resolves.toBe(true);
    });

    it('returns false when no record exists', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({});

      await expect(service.lookup('SCT-1', 'a.sql')).resolves.toBe(false);
    });

    it('propagates store errors', async () => {
      mockDynamoDBDocumentClient.send.mockRejectedValue(new Error('ServiceUnavailable'));

      await expect(service.lookup('SCT-1', 'a.sql')).rejects.toThrow('ServiceUnavailable');
    });
  });

  describe('put', () => {
    const record: ExecutionRecord = {
      deployment_id: 'SCT-1',
      script_name: 'a_2024_01_01_v1.sql',
      script_path: 'sql_data/deployment/SCT-1/a_2024_01_01_v1.sql',
      deployed_at: '2024-06-01T00:00:00.000Z',
      status: 'FAILED',
      failure_reason: 'boom',
    };

    it('guards a non-terminal record so it cannot replace a terminal one', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({});

      await service.put(record);

      expect(PutCommand).toHaveBeenCalledWith({
        TableName: tableName,
        Item: record,
        ConditionExpression:
          'attribute_not_exists(deployment_id) OR NOT (#status = :success OR (#status = :ignored AND #reason = :alreadyExecuted))',
        ExpressionAttributeNames: { '#status': 'status', '#reason': 'failure_reason' },
        ExpressionAttributeValues: {
          ':success': 'SUCCESS',
          ':ignored': 'IGNORED',
          ':alreadyExecuted': 'Already executed',
        },
      });
      expect(mockDynamoDBDocumentClient.send).toHaveBeenCalledTimes(1);
    });

    it('writes a SUCCESS record unconditionally', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({});
      const success: ExecutionRecord = {
        deployment_id: 'SCT-1',
        script_name: 'a_2024_01_01_v1.sql',
        script_path: 'sql_data/deployment/SCT-1/a_2024_01_01_v1.sql',
        deployed_at: '2024-06-01T00:00:00.000Z',
        status: 'SUCCESS',
      };

      await service.put(success);

      expect(PutCommand).toHaveBeenCalledWith({ TableName: tableName, Item: success });
    });

    it('writes an "Already executed" skip unconditionally', async () => {
      mockDynamoDBDocumentClient.send.mockResolvedValue({});
      const skipped: ExecutionRecord = { ...record, status: 'IGNORED', failure_reason: 'Already executed' };

      await service.put(skipped);

      expect(PutCommand).toHaveBeenCalledWith({ TableName: tableName, Item: skipped });
    });

    it('drops the write when the key already holds a terminal record', async () => {
      const conditionFailed = new Error('The conditional request failed');
      conditionFailed.name = 'ConditionalCheckFailedException';
      mockDynamoDBDocumentClient.send.mockRejectedValue(conditionFailed);

      await expect(service.put(record)).resolves.toBeUndefined();
    });

    it('rethrows write errors', async () => {
      mockDynamoDBDocumentClient.send.mockRejectedValue(new Error('ValidationException'));

      await expect(service.put(record)).rejects.toThrow('ValidationException');
    });
  });
});
