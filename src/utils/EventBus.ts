import { EventEmitter } from 'events';
import { NotifyClassification } from '../download/core/types';
import { logger } from './logger';

export enum QueueEvents {
  QUEUED = 'request_queued',
  STARTED = 'request_started',
  SUCCEEDED = 'request_succeeded',
  FAILED = 'request_failed',
  CANCELLED = 'request_cancelled',
}

export interface QueueEventData {
  requestId: string;
  userId: number;
  platform: string;
  position?: number;
  classification?: NotifyClassification;
  message?: string;
}

export type QueueEventListener = (data: QueueEventData) => void;

/**
 * Lifecycle events of one DownloadQueue
 */
export class QueueEventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(20);
  }

  public emit(event: QueueEvents, data: QueueEventData): boolean {
    logger.debug(`QueueEventBus: Emitting ${event}`, { ...data });
    return super.emit(event, data);
  }

  public on(event: QueueEvents, listener: QueueEventListener): this {
    return super.on(event, listener);
  }
}
