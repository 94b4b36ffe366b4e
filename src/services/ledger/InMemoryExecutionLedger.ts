import { ExecutionRecord, isTerminalRecord } from '../../types/DeploymentTypes';
import { IExecutionLedger } from './IExecutionLedger';

function keyOf(deploymentId: string, scriptName: string): string {
  return `${deploymentId}#${scriptName}`;
}

/**
 * Map-backed ledger for tests and local dry runs.
 */
export class InMemoryExecutionLedger implements IExecutionLedger {
  private items = new Map<string, ExecutionRecord>();

  constructor(seed: readonly ExecutionRecord[] = []) {
    for (const record of seed) {
      this.items.set(keyOf(record.deployment_id, record.script_name), { ...record });
    }
  }

  async lookup(deploymentId: string, scriptName: string): Promise<boolean> {
    return isTerminalRecord(this.items.get(keyOf(deploymentId, scriptName)));
  }

  async put(record: ExecutionRecord): Promise<void> {
    const key = keyOf(record.deployment_id, record.script_name);
    if (!isTerminalRecord(record) && isTerminalRecord(this.items.get(key))) {
      return;
    }
    this.items.set(key, { ...record });
  }

  get(deploymentId: string, scriptName: string): ExecutionRecord | undefined {
    return this.items.get(keyOf(deploymentId, scriptName));
  }

  records(): ExecutionRecord[] {
    return [...this.items.values()];
  }
}
