/**
 * Deployment Grouper
 *
 * Path contract: `<root>/<deploymentRoot>/<deployment_id>/.../<script_name>`.
 * Anything else is unrelated to deployments and is dropped without a trace.
 */

import {
  DEFAULT_DEPLOYMENT_PATH_RULES,
  DeploymentGroups,
  DeploymentPathRules,
  ScriptFile,
} from '../../types/DeploymentTypes';

const MIN_SEGMENTS = 4;

/** Deployment id for a path, or undefined if the path is outside the contract. */
export function deploymentIdOf(
  path: string,
  rules: DeploymentPathRules = DEFAULT_DEPLOYMENT_PATH_RULES
): string | undefined {
  const segments = path.split('/');
  if (segments.length < MIN_SEGMENTS) return undefined;
  if (segments[1] !== rules.deploymentRoot) return undefined;
  const deploymentId = segments[2];
  return rules.deploymentIdPattern.test(deploymentId) ? deploymentId : undefined;
}

export function groupByDeployment(
  files: readonly ScriptFile[],
  rules: DeploymentPathRules = DEFAULT_DEPLOYMENT_PATH_RULES
): DeploymentGroups {
  const groups: DeploymentGroups = new Map();
  for (const file of files) {
    const deploymentId = deploymentIdOf(file.path, rules);
    if (deploymentId === undefined) continue;

    const group = groups.get(deploymentId);
    if (group) {
      group.push(file);
    } else {
      groups.set(deploymentId, [file]);
    }
  }
  return groups;
}
