/**
 * SQL Deployment Types
 *
 * Shared shapes for the deployment pipeline: input files, per-script outcomes,
 * ledger records and the handler contract.
 */

/**
 * Input unit. `path` is slash-delimited (`<root>/deployment/<deployment_id>/.../<script_name>`);
 * `content` is passed through to the executor untouched.
 */
export interface ScriptFile {
  readonly path: string;
  readonly content: string;
}

/** deployment_id → files, in input order until the orderer runs. */
export type DeploymentGroups = Map<string, ScriptFile[]>;

export type ScriptStatus = 'SUCCESS' | 'FAILED' | 'IGNORED';

/** Per-deployment control state once processing stops. */
export type DeploymentRunStatus = 'DONE' | 'HALTED';

export interface ScriptOutcome {
  status: ScriptStatus;
  reason?: string;
}

/**
 * Durable audit item, keyed by (deployment_id, script_name).
 * failure_reason is present iff status !== 'SUCCESS'.
 */
export interface ExecutionRecord {
  deployment_id: string;
  script_name: string;
  script_path: string;
  deployed_at: string; // ISO-8601 UTC
  status: ScriptStatus;
  failure_reason?: string;
}

export interface DeploymentNotice {
  deploymentId: string;
  scriptName: string;
  scriptPath: string;
  status: ScriptStatus;
  reason?: string;
}

export interface SqlDeploymentFileInput {
  filename: string;
  content: string;
}

export interface SqlDeploymentEvent {
  files?: SqlDeploymentFileInput[];
}

export type SqlDeploymentRunStatus = 'NO_FILES' | 'COMPLETED';

export interface SqlDeploymentResult {
  status: SqlDeploymentRunStatus;
}

/** Structural rules a file path must satisfy to belong to a deployment. */
export interface DeploymentPathRules {
  /** Literal expected at segment[1]. */
  deploymentRoot: string;
  /** Pattern segment[2] (the deployment id) must match. */
  deploymentIdPattern: RegExp;
}

export const DEFAULT_DEPLOYMENT_PATH_RULES: DeploymentPathRules = {
  deploymentRoot: 'deployment',
  deploymentIdPattern: /^SCT-/,
};

export const IgnoreReasons = {
  NO_DATE: 'No valid date in filename',
  NO_VERSION: 'No valid version in filename',
  INVALID_DATE: 'Invalid calendar date in filename',
  TOO_OLD: 'Older than allowed threshold',
  ALREADY_EXECUTED: 'Already executed',
} as const;

export type IgnoreReason = (typeof IgnoreReasons)[keyof typeof IgnoreReasons];

/** Scripts without a parseable version sort after every versioned script. */
export const MISSING_VERSION_SENTINEL = 9999;

/** Dry-run executor fails any script whose content contains this marker. */
export const DRY_RUN_FAILURE_MARKER = '-- @deploy-fail';

/**
 * A record proves the script already ran when it is SUCCESS, or an
 * "Already executed" skip, which only ever overwrites a terminal record.
 */
export function isTerminalRecord(
  record: Pick<ExecutionRecord, 'status' | 'failure_reason'> | undefined
): boolean {
  if (!record) return false;
  return (
    record.status === 'SUCCESS' ||
    (record.status === 'IGNORED' && record.failure_reason === IgnoreReasons.ALREADY_EXECUTED)
  );
}
