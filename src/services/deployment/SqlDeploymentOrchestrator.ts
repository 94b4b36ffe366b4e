/**
 * SQL Deployment Orchestrator
 *
 * Per deployment (ascending id): order scripts, then for each script
 * validate name → check age → ledger lookup → execute. Every decision is written
 * to the ledger; non-success outcomes are notified. The first FAILED script halts
 * the rest of its deployment; other deployments still run.
 *
 * Strictly sequential: one deployment, one script at a time. A timed-out script
 * is aborted and awaited before the next one starts.
 */

import {
  DEFAULT_DEPLOYMENT_PATH_RULES,
  DeploymentPathRules,
  DeploymentRunStatus,
  ExecutionRecord,
  IgnoreReasons,
  ScriptFile,
  ScriptOutcome,
  ScriptStatus,
  SqlDeploymentResult,
} from '../../types/DeploymentTypes';
import { ScriptTimeoutError, errorMessage } from '../../types/DeploymentErrors';
import { IExecutionLedger } from '../ledger/IExecutionLedger';
import { IScriptExecutor } from '../execution/IScriptExecutor';
import { INotifier } from '../notification/INotifier';
import { Logger } from '../core/Logger';
import { groupByDeployment } from './DeploymentGrouper';
import { orderScripts } from './ScriptOrderer';
import { parseScriptName, scriptNameOf } from './ScriptFilenameValidator';
import { evaluateScriptAge } from './ScriptAgePolicy';

export interface SqlDeploymentOrchestratorOptions {
  maxScriptAgeMonths: number;
  pathRules?: DeploymentPathRules;
  /** Proceed as "not executed" when the ledger read fails. Default: true. */
  ledgerFailOpen?: boolean;
  /** Email on "Already executed" skips. Default: true. */
  notifyOnAlreadyExecuted?: boolean;
  /** Per-script execution timeout; 0 or unset disables it. */
  scriptTimeoutMs?: number;
  clock?: () => Date;
}

export interface SqlDeploymentOrchestratorConfig {
  ledger: IExecutionLedger;
  executor: IScriptExecutor;
  notifier: INotifier;
  logger: Logger;
  options: SqlDeploymentOrchestratorOptions;
}

export class SqlDeploymentOrchestrator {
  private ledger: IExecutionLedger;
  private executor: IScriptExecutor;
  private notifier: INotifier;
  private logger: Logger;
  private maxScriptAgeMonths: number;
  private pathRules: DeploymentPathRules;
  private ledgerFailOpen: boolean;
  private notifyOnAlreadyExecuted: boolean;
  private scriptTimeoutMs: number;
  private clock: () => Date;

  constructor(config: SqlDeploymentOrchestratorConfig) {
    this.ledger = config.ledger;
    this.executor = config.executor;
    this.notifier = config.notifier;
    this.logger = config.logger;
    this.maxScriptAgeMonths = config.options.maxScriptAgeMonths;
    this.pathRules = config.options.pathRules ?? DEFAULT_DEPLOYMENT_PATH_RULES;
    this.ledgerFailOpen = config.options.ledgerFailOpen ?? true;
    this.notifyOnAlreadyExecuted = config.options.notifyOnAlreadyExecuted ?? true;
    this.scriptTimeoutMs = config.options.scriptTimeoutMs ?? 0;
    this.clock = config.options.clock ?? (() => new Date());
  }

  async run(files: readonly ScriptFile[]): Promise<SqlDeploymentResult> {
    const groups = groupByDeployment(files, this.pathRules);
    if (groups.size === 0) {
      this.logger.info('No deployment files in batch', { received: files.length });
      return { status: 'NO_FILES' };
    }

    const deploymentIds = [...groups.keys()].sort();
    for (const deploymentId of deploymentIds) {
      const runStatus = await this.runDeployment(deploymentId, groups.get(deploymentId) ?? []);
      this.logger.info('Deployment processed', { deploymentId, runStatus });
    }

    return { status: 'COMPLETED' };
  }

  async runDeployment(
    deploymentId: string,
    files: readonly ScriptFile[]
  ): Promise<DeploymentRunStatus> {
    const ordered = orderScripts(files);
    this.logger.setContext({ deploymentId });
    try {
      for (let i = 0; i < ordered.length; i++) {
        const outcome = await this.processScript(deploymentId, ordered[i]);
        if (outcome.status === 'FAILED') {
          this.logger.warn('Deployment halted', {
            failedScript: ordered[i].path,
            skipped: ordered.slice(i + 1).map((file) => file.path),
          });
          return 'HALTED';
        }
      }
      return 'DONE';
    } finally {
      this.logger.setContext({});
    }
  }

  async processScript(deploymentId: string, file: ScriptFile): Promise<ScriptOutcome> {
    const scriptName = scriptNameOf(file.path);
    const now = this.clock();

    const parsed = parseScriptName(scriptName);
    if (!parsed.valid) {
      return this.recordAndNotify(deploymentId, file, 'IGNORED', parsed.reason);
    }

    if (evaluateScriptAge(parsed.date, this.maxScriptAgeMonths, now) === 'TOO_OLD') {
      return this.recordAndNotify(deploymentId, file, 'IGNORED', IgnoreReasons.TOO_OLD);
    }

    let alreadyExecuted = false;
    try {
      alreadyExecuted = await this.ledger.lookup(deploymentId, scriptName);
    } catch (error) {
      if (!this.ledgerFailOpen) {
        return this.recordAndNotify(
          deploymentId,
          file,
          'FAILED',
          `Ledger lookup failed: ${errorMessage(error)}`
        );
      }
      // Fail-open: a store outage risks a duplicate run rather than blocking the batch
      this.logger.warn('Ledger lookup failed; proceeding as not executed', {
        deploymentId,
        scriptName,
        error: errorMessage(error),
      });
    }

    if (alreadyExecuted) {
      return this.notifyOnAlreadyExecuted
        ? this.recordAndNotify(deploymentId, file, 'IGNORED', IgnoreReasons.ALREADY_EXECUTED)
        : this.record(deploymentId, file, 'IGNORED', IgnoreReasons.ALREADY_EXECUTED);
    }

    try {
      await this.executeWithTimeout(file.content);
    } catch (error) {
      this.logger.error('Script execution failed', {
        deploymentId,
        scriptName,
        error: errorMessage(error),
      });
      return this.recordAndNotify(deploymentId, file, 'FAILED', errorMessage(error));
    }

    this.logger.info('Script executed', { deploymentId, scriptName });
    return this.record(deploymentId, file, 'SUCCESS');
  }

  private async executeWithTimeout(content: string): Promise<void> {
    if (this.scriptTimeoutMs <= 0) {
      await this.executor.execute(content);
      return;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.scriptTimeoutMs);
    try {
      await this.executor.execute(content, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ScriptTimeoutError(this.scriptTimeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async record(
    deploymentId: string,
    file: ScriptFile,
    status: ScriptStatus,
    reason?: string
  ): Promise<ScriptOutcome> {
    const record: ExecutionRecord = {
      deployment_id: deploymentId,
      script_name: scriptNameOf(file.path),
      script_path: file.path,
      deployed_at: this.clock().toISOString(),
      status,
      ...(status !== 'SUCCESS' && reason !== undefined ? { failure_reason: reason } : {}),
    };

    try {
      await this.ledger.put(record);
    } catch (error) {
      // Outcome stands even if the audit write is lost
      this.logger.error('Ledger write failed', {
        deploymentId,
        scriptName: record.script_name,
        status,
        error: errorMessage(error),
      });
    }

    return reason === undefined ? { status } : { status, reason };
  }

  private async recordAndNotify(
    deploymentId: string,
    file: ScriptFile,
    status: ScriptStatus,
    reason: string
  ): Promise<ScriptOutcome> {
    const outcome = await this.record(deploymentId, file, status, reason);

    try {
      await this.notifier.notify({
        deploymentId,
        scriptName: scriptNameOf(file.path),
        scriptPath: file.path,
        status,
        reason,
      });
    } catch (error) {
      this.logger.warn('Notification failed', {
        deploymentId,
        scriptName: scriptNameOf(file.path),
        status,
        error: errorMessage(error),
      });
    }

    return outcome;
  }
}
