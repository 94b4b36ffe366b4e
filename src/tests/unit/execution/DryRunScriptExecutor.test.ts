import { DryRunScriptExecutor } from '../../../services/execution/DryRunScriptExecutor';
import { Logger } from '../../../services/core/Logger';
import { DRY_RUN_FAILURE_MARKER } from '../../../types/DeploymentTypes';
import { ScriptExecutionError } from '../../../types/DeploymentErrors';

describe('DryRunScriptExecutor', () => {
  const executor = new DryRunScriptExecutor(new Logger('DryRunScriptExecutorTest'));

  it('succeeds for ordinary content', async () => {
    await expect(executor.execute('SELECT 1')).resolves.toBeUndefined();
  });

  it('fails when the content carries the failure marker', async () => {
    await expect(executor.execute(`SELECT 1;\n${DRY_RUN_FAILURE_MARKER}\n`)).rejects.toThrow(
      ScriptExecutionError
    );
  });

  it('fails when aborted before it runs', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(executor.execute('SELECT 1', controller.signal)).rejects.toThrow('Dry-run execution aborted');
  });
});
