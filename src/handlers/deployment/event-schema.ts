/**
 * SQL Deployment Event Schema
 *
 * Kept apart from the handler so scripts and tests can import it without the
 * handler's module-level config loading and client wiring.
 */

import { z } from 'zod';
import { ScriptFile } from '../../types/DeploymentTypes';

/** `files` may be omitted (treated as empty); unknown top-level fields are ignored. */
export const SqlDeploymentEventSchema = z.object({
  files: z
    .array(
      z.object({
        filename: z.string().min(1, 'filename is required'),
        content: z.string(),
      })
    )
    .default([]),
});

export type ParsedSqlDeploymentEvent = z.infer<typeof SqlDeploymentEventSchema>;

export function toScriptFiles(event: ParsedSqlDeploymentEvent): ScriptFile[] {
  return event.files.map((file) => ({ path: file.filename, content: file.content }));
}
