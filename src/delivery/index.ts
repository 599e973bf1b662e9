/**
 * Delivery Module
 *
 * EmailSender capability and report delivery:
 * - Dry run: the HTML body is saved as the `report_preview` snapshot
 * - Live: both bodies are emailed to the configured recipients
 *
 * Delivery never decides the outcome of a run; failures are logged.
 */

import { SESClient, SendEmailCommand, type SendEmailCommandOutput } from '@aws-sdk/client-ses';
import { defaultLogger } from '../logging/index.js';
import type { SnapshotRecorder } from '../storage/index.js';
import type { Logger, RenderedReport } from '../types/index.js';

export interface EmailMessage {
  from: string;
  to: string[];
  subject: string;
  textBody: string;
  htmlBody: string;
}

export interface EmailResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface EmailSender {
  send(message: EmailMessage): Promise<EmailResult>;
}

/**
 * Narrow view of the SES client, injectable in tests
 */
export interface SesTransport {
  send(command: SendEmailCommand): Promise<SendEmailCommandOutput>;
}

export class SesEmailSender implements EmailSender {
  private transport: SesTransport;
  private logger: Logger;

  constructor(config: { region: string }, logger: Logger = defaultLogger, transport?: SesTransport) {
    this.logger = logger;
    if (transport) {
      this.transport = transport;
    } else {
      const client = new SESClient({ region: config.region });
      this.transport = { send: (command) => client.send(command) };
    }
  }

  async send(message: EmailMessage): Promise<EmailResult> {
    try {
      const response = await this.transport.send(
        new SendEmailCommand({
          Source: message.from,
          Destination: { ToAddresses: message.to },
          Message: {
            Subject: { Data: message.subject, Charset: 'UTF-8' },
            Body: {
              Text: { Data: message.textBody, Charset: 'UTF-8' },
              Html: { Data: message.htmlBody, Charset: 'UTF-8' },
            },
          },
        })
      );
      this.logger.info('Email sent', { messageId: response.MessageId, recipients: message.to });
      return { success: true, ...(response.MessageId ? { messageId: response.MessageId } : {}) };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error('Email send failed', { error: errorMessage });
      return { success: false, error: errorMessage };
    }
  }
}

/**
 * Sender used when no email transport is configured
 */
export class NullEmailSender implements EmailSender {
  async send(_message: EmailMessage): Promise<EmailResult> {
    return { success: false, error: 'Email delivery not configured' };
  }
}

export interface DeliveryOptions {
  dryRun: boolean;
  recorder: SnapshotRecorder;
  sender: EmailSender;
  from: string;
  recipients: string[];
  logger?: Logger;
}

/**
 * Deliver a rendered report. Returns true when the preview was saved or the
 * email was accepted.
 */
export async function deliverReport(report: RenderedReport, options: DeliveryOptions): Promise<boolean> {
  const logger = options.logger ?? defaultLogger;

  if (options.dryRun) {
    const saved = await options.recorder.recordHtml('report_preview', report.htmlBody);
    if (saved) {
      logger.info('Dry run report saved', { fileName: saved.fileName });
    }
    return saved !== null;
  }

  if (options.recipients.length === 0) {
    logger.warn('No report recipients configured; skipping email', { envVar: 'SES_TO_EMAILS' });
    return false;
  }

  const result = await options.sender.send({
    from: options.from,
    to: options.recipients,
    subject: report.subject,
    textBody: report.textBody,
    htmlBody: report.htmlBody,
  });
  return result.success;
}
