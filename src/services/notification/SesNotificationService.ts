/**
 * SES Notification Service
 *
 * One plain-text email per non-success outcome, to a single recipient.
 * Subject: `[SQL DEPLOYMENT] <STATUS>`.
 */

import { SESClient, SendEmailCommand } from '@aws-sdk/client-ses';
import { DeploymentNotice, ScriptStatus } from '../../types/DeploymentTypes';
import { INotifier } from './INotifier';
import { Logger } from '../core/Logger';

export function formatNoticeSubject(status: ScriptStatus): string {
  return `[SQL DEPLOYMENT] ${status}`;
}

export function formatNoticeBody(notice: DeploymentNotice): string {
  return [
    `Deployment ID : ${notice.deploymentId}`,
    `Script Name   : ${notice.scriptName}`,
    `Script Path   : ${notice.scriptPath}`,
    `Status        : ${notice.status}`,
    `Reason        : ${notice.reason ?? '-'}`,
  ].join('\n');
}

export class SesNotificationService implements INotifier {
  constructor(
    private sesClient: SESClient,
    private fromAddress: string,
    private toAddress: string,
    private logger: Logger
  ) {}

  async notify(notice: DeploymentNotice): Promise<void> {
    const result = await this.sesClient.send(
      new SendEmailCommand({
        Source: this.fromAddress,
        Destination: { ToAddresses: [this.toAddress] },
        Message: {
          Subject: { Data: formatNoticeSubject(notice.status) },
          Body: { Text: { Data: formatNoticeBody(notice) } },
        },
      })
    );

    this.logger.debug('Deployment notice sent', {
      deploymentId: notice.deploymentId,
      scriptName: notice.scriptName,
      status: notice.status,
      messageId: result.MessageId,
    });
  }
}
