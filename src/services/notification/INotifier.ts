import { DeploymentNotice } from '../../types/DeploymentTypes';

/**
 * Best-effort alert channel. Implementations may throw; the orchestrator
 * logs and absorbs every failure.
 */
export interface INotifier {
  notify(notice: DeploymentNotice): Promise<void>;
}
