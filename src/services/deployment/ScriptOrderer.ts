/**
 * Script Orderer: version ascending (unversioned last), then path.
 */

import { MISSING_VERSION_SENTINEL, ScriptFile } from '../../types/DeploymentTypes';
import { extractVersion, scriptNameOf } from './ScriptFilenameValidator';

function sortVersion(file: ScriptFile): number {
  return extractVersion(scriptNameOf(file.path)) ?? MISSING_VERSION_SENTINEL;
}

export function orderScripts(files: readonly ScriptFile[]): ScriptFile[] {
  return files
    .map((file) => ({ file, version: sortVersion(file) }))
    .sort((a, b) => {
      if (a.version !== b.version) return a.version - b.version;
      if (a.file.path < b.file.path) return -1;
      if (a.file.path > b.file.path) return 1;
      return 0;
    })
    .map(({ file }) => file);
}
