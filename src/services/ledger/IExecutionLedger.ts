import { ExecutionRecord } from '../../types/DeploymentTypes';

/**
 * Idempotency ledger keyed by (deployment_id, script_name).
 *
 * lookup() answers "has this script already run successfully?" (see
 * isTerminalRecord); FAILED and other IGNORED records never block a later attempt.
 * lookup + put are not atomic; two overlapping invocations can both execute a script.
 */
export interface IExecutionLedger {
  /** True iff the key holds a terminal record. Store errors propagate. */
  lookup(deploymentId: string, scriptName: string): Promise<boolean>;
  /**
   * Upsert by key. A non-terminal record never replaces a terminal one; that
   * write is dropped without error.
   */
  put(record: ExecutionRecord): Promise<void>;
}
