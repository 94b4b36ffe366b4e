/**
 * SQL Deployment Orchestrator
 *
 * Library entry point. Production execution happens via the Lambda handler in
 * handlers/deployment/sql-deployment-handler.ts; see infrastructure/ for the CDK app.
 */

export * from './types/DeploymentTypes';
export * from './types/DeploymentErrors';
export { Logger } from './services/core/Logger';
export type { LogMeta } from './services/core/Logger';
export {
  loadDeploymentConfig,
  orchestratorOptionsFromConfig,
  requireConfigValue,
} from './config/deploymentConfig';
export type { DeploymentConfig, SqlExecutorMode } from './config/deploymentConfig';
export { groupByDeployment, deploymentIdOf } from './services/deployment/DeploymentGrouper';
export {
  parseScriptName,
  parseScriptDate,
  extractVersion,
  scriptNameOf,
} from './services/deployment/ScriptFilenameValidator';
export type { ParsedScriptName } from './services/deployment/ScriptFilenameValidator';
export { evaluateScriptAge, ageCutoff } from './services/deployment/ScriptAgePolicy';
export type { ScriptAgeVerdict } from './services/deployment/ScriptAgePolicy';
export { orderScripts } from './services/deployment/ScriptOrderer';
export { SqlDeploymentOrchestrator } from './services/deployment/SqlDeploymentOrchestrator';
export type {
  SqlDeploymentOrchestratorConfig,
  SqlDeploymentOrchestratorOptions,
} from './services/deployment/SqlDeploymentOrchestrator';
export type { IExecutionLedger } from './services/ledger/IExecutionLedger';
export { DeploymentLedgerService } from './services/ledger/DeploymentLedgerService';
export { InMemoryExecutionLedger } from './services/ledger/InMemoryExecutionLedger';
export type { IScriptExecutor } from './services/execution/IScriptExecutor';
export { PostgresScriptExecutor } from './services/execution/PostgresScriptExecutor';
export { DryRunScriptExecutor } from './services/execution/DryRunScriptExecutor';
export type { INotifier } from './services/notification/INotifier';
export {
  SesNotificationService,
  formatNoticeBody,
  formatNoticeSubject,
} from './services/notification/SesNotificationService';
export { LoggingNotifier } from './services/notification/LoggingNotifier';
export { SqlDeploymentEventSchema, toScriptFiles } from './handlers/deployment/event-schema';
export type { ParsedSqlDeploymentEvent } from './handlers/deployment/event-schema';
