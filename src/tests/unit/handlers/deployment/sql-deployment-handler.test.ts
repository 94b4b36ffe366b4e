/**
 * SQL Deployment Handler Unit Tests
 *
 * Covers: event validation, file mapping, orchestrator result pass-through,
 * module-level wiring in dry-run mode.
 */

import { mockDynamoDBDocumentClient, mockSESClient } from '../../../__mocks__/aws-sdk-clients';

jest.mock('@aws-sdk/client-dynamodb', () => ({
  DynamoDBClient: jest.fn().mockImplementation(() => ({})),
}));

jest.mock('@aws-sdk/lib-dynamodb', () => ({
  DynamoDBDocumentClient: { from: jest.fn(() => mockDynamoDBDocumentClient) },
  GetCommand: jest.fn(),
  PutCommand: jest.fn(),
}));

jest.mock('@aws-sdk/client-ses', () => ({
  SESClient: jest.fn(() => mockSESClient),
  SendEmailCommand: jest.fn(),
}));

jest.mock('../../../../config/deploymentConfig', () => {
  const actual = jest.requireActual('../../../../config/deploymentConfig');
  return {
    ...actual,
    loadDeploymentConfig: () =>
      actual.loadDeploymentConfig({
        NOTIFY_EMAIL_TO: 'dba-team@example.com',
        NOTIFY_EMAIL_FROM: 'deploy-bot@example.com',
        SQL_EXECUTOR_MODE: 'dry-run',
      }),
  };
});

import { buildOrchestrator, createHandler, handler } from '../../../../handlers/deployment/sql-deployment-handler';
import { loadDeploymentConfig } from '../../../../config/deploymentConfig';
import { Logger } from '../../../../services/core/Logger';
import { SqlDeploymentOrchestrator } from '../../../../services/deployment/SqlDeploymentOrchestrator';
import { ConfigurationError, InvalidEventError } from '../../../../types/DeploymentErrors';

const logger = new Logger('SqlDeploymentHandlerTest');

describe('SqlDeploymentHandler', () => {
  let run: jest.Mock;
  let testHandler: ReturnType<typeof createHandler>;

  beforeEach(() => {
    run = jest.fn().mockResolvedValue({ status: 'COMPLETED' });
    testHandler = createHandler({ run } as any, logger);
  });

  it('maps filename/content pairs to script files and returns the orchestrator result', async () => {
    const result = await testHandler(
      {
        files: [
          { filename: 'db/deployment/SCT-1/a_2024_05_01_v1.sql', content: 'SELECT 1' },
          { filename: 'README.md', content: '' },
        ],
      },
      {} as any,
      jest.fn()
    );

    expect(result).toEqual({ status: 'COMPLETED' });
    expect(run).toHaveBeenCalledWith([
      { path: 'db/deployment/SCT-1/a_2024_05_01_v1.sql', content: 'SELECT 1' },
      { path: 'README.md', content: '' },
    ]);
  });

  it('treats a missing files list as an empty batch', async () => {
    run.mockResolvedValue({ status: 'NO_FILES' });

    const result = await testHandler({}, {} as any, jest.fn());

    expect(result).toEqual({ status: 'NO_FILES' });
    expect(run).toHaveBeenCalledWith([]);
  });

  it('treats a null event as an empty batch', async () => {
    await testHandler(null, {} as any, jest.fn());

    expect(run).toHaveBeenCalledWith([]);
  });

  it('rejects an event whose files are not a list', async () => {
    await expect(testHandler({ files: 'nope' }, {} as any, jest.fn())).rejects.toThrow(InvalidEventError);
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects a file entry without a filename', async () => {
    await expect(
      testHandler({ files: [{ filename: '', content: 'SELECT 1' }] }, {} as any, jest.fn())
    ).rejects.toThrow('filename is required');
  });

  it('propagates orchestrator errors', async () => {
    run.mockRejectedValue(new Error('unexpected'));

    await expect(testHandler({ files: [] }, {} as any, jest.fn())).rejects.toThrow('unexpected');
  });
});

describe('buildOrchestrator', () => {
  it('builds a dry-run orchestrator without a database secret', () => {
    const config = loadDeploymentConfig();

    expect(buildOrchestrator(config, logger)).toBeInstanceOf(SqlDeploymentOrchestrator);
  });

  it('requires DB_SECRET_NAME in postgres mode', () => {
    const config = { ...loadDeploymentConfig(), executorMode: 'postgres' as const };

    expect(() => buildOrchestrator(config, logger)).toThrow(ConfigurationError);
  });

  it('requires the notification addresses', () => {
    const config = { ...loadDeploymentConfig(), notifyEmailTo: undefined };

    expect(() => buildOrchestrator(config, logger)).toThrow(
      'Missing required environment variable: NOTIFY_EMAIL_TO.'
    );
  });
});

describe('handler (module wiring)', () => {
  beforeEach(() => {
    mockDynamoDBDocumentClient.send.mockReset();
    mockSESClient.send.mockReset();
  });

  it('runs a batch end to end against the mocked ledger', async () => {
    mockDynamoDBDocumentClient.send.mockResolvedValue({});

    const result = await handler(
      { files: [{ filename: 'db/deployment/SCT-9/seed_2099_01_01_v1.sql', content: 'SELECT 1' }] },
      {} as any,
      jest.fn()
    );

    expect(result).toEqual({ status: 'COMPLETED' });
    // lookup + put
    expect(mockDynamoDBDocumentClient.send).toHaveBeenCalledTimes(2);
    expect(mockSESClient.send).not.toHaveBeenCalled();
  });
});
