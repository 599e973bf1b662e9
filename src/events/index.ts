/**
 * Events Module
 *
 * EventSink capability: structured audit events for each pipeline step.
 * One sink is created per run and handed to the pipeline; nothing is global.
 *
 * Event names are prefixed with `new_employees_sync.`.
 */

import { SQSClient, SendMessageCommand, type SendMessageCommandOutput } from '@aws-sdk/client-sqs';
import { defaultLogger } from '../logging/index.js';
import type { Logger } from '../types/index.js';

export const EVENT_PREFIX = 'new_employees_sync';

export type EventLevel = 'info' | 'error' | 'success';

export interface EventSink {
  info(eventType: string, message: string): Promise<void>;
  error(eventType: string, message: string): Promise<void>;
  success(eventType: string, message: string): Promise<void>;
}

/**
 * Message body published to the events queue
 */
export interface EventEnvelope {
  organization_id: string;
  source_id: string;
  level: EventLevel;
  event_type: string;
  details: { message: string };
  timestamp: string;
}

/**
 * Narrow view of the SQS client, injectable in tests
 */
export interface SqsTransport {
  send(command: SendMessageCommand): Promise<SendMessageCommandOutput>;
}

export interface SqsEventSinkConfig {
  queueUrl: string;
  region: string;
  /** Client (tenant) the run belongs to */
  organizationId: string;
  /** Name of the deployed function */
  sourceId: string;
}

function qualify(eventType: string): string {
  return `${EVENT_PREFIX}.${eventType}`;
}

function echo(logger: Logger, level: EventLevel, eventType: string, message: string): void {
  const meta = { event: qualify(eventType) };
  if (level === 'error') {
    logger.error(message, meta);
  } else {
    logger.info(message, meta);
  }
}

/**
 * Sink that only writes to the logger
 */
export class LoggerEventSink implements EventSink {
  constructor(private logger: Logger = defaultLogger) {}

  async info(eventType: string, message: string): Promise<void> {
    echo(this.logger, 'info', eventType, message);
  }

  async error(eventType: string, message: string): Promise<void> {
    echo(this.logger, 'error', eventType, message);
  }

  async success(eventType: string, message: string): Promise<void> {
    echo(this.logger, 'success', eventType, message);
  }
}

/**
 * Sink that publishes each event to an SQS queue and echoes it to the logger.
 * A failed publish is logged; it never interrupts the caller.
 */
export class SqsEventSink implements EventSink {
  private transport: SqsTransport;
  private config: SqsEventSinkConfig;
  private logger: Logger;
  private now: () => Date;

  constructor(
    config: SqsEventSinkConfig,
    logger: Logger = defaultLogger,
    transport?: SqsTransport,
    now: () => Date = () => new Date()
  ) {
    this.config = config;
    this.logger = logger;
    this.now = now;
    if (transport) {
      this.transport = transport;
    } else {
      const client = new SQSClient({ region: config.region });
      this.transport = { send: (command) => client.send(command) };
    }
  }

  async info(eventType: string, message: string): Promise<void> {
    await this.publish('info', eventType, message);
  }

  async error(eventType: string, message: string): Promise<void> {
    await this.publish('error', eventType, message);
  }

  async success(eventType: string, message: string): Promise<void> {
    await this.publish('success', eventType, message);
  }

  private async publish(level: EventLevel, eventType: string, message: string): Promise<void> {
    echo(this.logger, level, eventType, message);

    const envelope: EventEnvelope = {
      organization_id: this.config.organizationId,
      source_id: this.config.sourceId,
      level,
      event_type: qualify(eventType),
      details: { message },
      timestamp: this.now().toISOString(),
    };

    try {
      await this.transport.send(
        new SendMessageCommand({
          QueueUrl: this.config.queueUrl,
          MessageBody: JSON.stringify(envelope),
        })
      );
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn('Failed to publish event', { event: envelope.event_type, error: errorMessage });
    }
  }
}
