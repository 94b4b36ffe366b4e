import { DRY_RUN_FAILURE_MARKER } from '../../types/DeploymentTypes';
import { ScriptExecutionError } from '../../types/DeploymentErrors';
import { IScriptExecutor } from './IScriptExecutor';
import { Logger } from '../core/Logger';

/**
 * Executes nothing. Scripts containing DRY_RUN_FAILURE_MARKER fail, so the
 * failure path can be rehearsed without a database.
 */
export class DryRunScriptExecutor implements IScriptExecutor {
  constructor(private logger: Logger) {}

  async execute(content: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ScriptExecutionError('Dry-run execution aborted');
    }
    if (content.includes(DRY_RUN_FAILURE_MARKER)) {
      throw new ScriptExecutionError(`Dry-run failure marker found: ${DRY_RUN_FAILURE_MARKER}`);
    }
    this.logger.debug('Dry-run execution', { contentLength: content.length });
  }
}
