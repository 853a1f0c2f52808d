import {
  AdmissionReason,
  ContentType,
  NotifyClassification,
  Platform,
  PolicyReason,
  StrategyKind,
} from '../download/core/types';

/**
 * A queued download. `notifyTarget` is whatever the front end needs to reach
 * the requester; the queue only passes it through.
 */
export interface DownloadRequest<T> {
  id: string;
  requesterId: number;
  requesterDisplayName: string;
  url: string;
  platform: Platform;
  platformLabel: string;
  qualityHint: string;
  priority: number;
  submittedAt: number;
  /** Monotonic admission counter, the FIFO tie-break within a priority */
  sequence: number;
  notifyTarget: T;
}

export interface EnqueueInput<T> {
  requesterId: number;
  requesterDisplayName: string;
  url: string;
  qualityOverride?: string;
  priority?: number;
  notifyTarget: T;
}

export interface AdmissionRejection {
  kind: 'admission_rejected';
  reason: AdmissionReason;
}

export interface PolicyRejection {
  kind: 'policy_rejected';
  reason: PolicyReason;
}

export type EnqueueResult =
  | { status: 'queued'; position: number; requestId: string; platform: Platform }
  | { status: 'rejected'; error: AdmissionRejection | PolicyRejection };

export interface QueueStatus {
  pendingCount: number;
  activeCount: number;
}

export type ProgressStage = 'queued' | 'analyzing' | 'downloading' | 'fallback' | 'uploading';

export interface ProgressUpdate {
  stage: ProgressStage;
  /** 1-based place in the pending list, for `queued` */
  position?: number;
  contentType?: ContentType;
  strategy?: StrategyKind;
}

export interface DeliveryNotifier<T> {
  sendProgress(target: T, update: ProgressUpdate): Promise<void>;
  sendResult(target: T, filePath: string, title: string, platformLabel: string): Promise<void>;
  sendError(target: T, classification: NotifyClassification, message: string): Promise<void>;
}

export interface DownloadQueueOptions {
  maxConcurrent: number;
  maxQueueSize: number;
  defaultQuality: string;
  validQualityValues: readonly string[];
}
