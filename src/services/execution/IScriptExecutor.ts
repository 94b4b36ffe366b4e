/**
 * Opaque SQL execution boundary. Resolves on success; throws (ideally a
 * ScriptExecutionError) with a descriptive message on failure.
 *
 * When `signal` aborts, the executor stops the running script and settles only
 * once it has stopped.
 */
export interface IScriptExecutor {
  execute(content: string, signal?: AbortSignal): Promise<void>;
}
