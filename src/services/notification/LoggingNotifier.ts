import { DeploymentNotice } from '../../types/DeploymentTypes';
import { INotifier } from './INotifier';
import { Logger } from '../core/Logger';
import { formatNoticeBody, formatNoticeSubject } from './SesNotificationService';

/** Writes notices to the log instead of sending email (local rehearsals). */
export class LoggingNotifier implements INotifier {
  constructor(private logger: Logger) {}

  async notify(notice: DeploymentNotice): Promise<void> {
    this.logger.warn(formatNoticeSubject(notice.status), {
      deploymentId: notice.deploymentId,
      scriptName: notice.scriptName,
      body: formatNoticeBody(notice),
    });
  }
}
