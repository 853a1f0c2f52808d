import { v4 as uuidv4 } from 'uuid';
import { ContentAnalyzer } from '../download/core/ContentAnalyzer';
import {
  ContentAnalysis,
  ExtractionEngine,
  ExtractionMetadata,
  ExtractionStrategy,
  NotifyClassification,
  StrategyFailure,
  StrategyResult,
  StrategySet,
  StrategySuccess,
} from '../download/core/types';
import { PolicyGate } from '../download/security/PolicyGate';
import { RateLimiter } from '../download/security/RateLimiter';
import { selectStrategyOrder } from '../download/strategies/selectStrategyOrder';
import { HistoryStore } from '../database/HistoryStore';
import { QueueEventBus, QueueEvents } from '../utils/EventBus';
import { describeError, logError, logger } from '../utils/logger';
import { Mutex } from '../utils/Mutex';
import {
  DeliveryNotifier,
  DownloadQueueOptions,
  DownloadRequest,
  EnqueueInput,
  EnqueueResult,
  ProgressUpdate,
  QueueStatus,
} from './types';

export interface DownloadQueueDependencies<T> {
  rateLimiter: RateLimiter;
  policyGate: PolicyGate;
  analyzer: ContentAnalyzer;
  engine: ExtractionEngine;
  strategies: StrategySet;
  notifier: DeliveryNotifier<T>;
  history: HistoryStore;
  now?: () => number;
}

interface Analyzed {
  analysis: ContentAnalysis;
  metadata?: ExtractionMetadata;
}

/**
 * DownloadQueue - Bounded priority queue plus a concurrency-limited dispatcher
 *
 * All queue state (`pending`, `activeCount`, the rate limiter's windows) is
 * touched only inside `lock`. Extraction runs outside the lock, one request
 * per slot, and a slot is released only when its request reaches a terminal
 * state. A single dispatch loop is started by `start()`; enqueue and slot
 * release only wake it.
 */
export class DownloadQueue<T> {
  readonly events = new QueueEventBus();

  private readonly pending: DownloadRequest<T>[] = [];
  private activeCount = 0;
  private sequence = 0;
  private readonly lock = new Mutex();

  private running = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private wakeRequested = false;
  private readonly inFlight = new Set<Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  // The "queued" notice of each pending request; processing waits for it
  private readonly announcements = new Map<string, Promise<void>>();

  private readonly options: DownloadQueueOptions;
  private readonly deps: DownloadQueueDependencies<T>;
  private readonly now: () => number;

  constructor(options: DownloadQueueOptions, deps: DownloadQueueDependencies<T>) {
    this.options = options;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    logger.info('🎯 DownloadQueue initialized', {
      maxConcurrent: options.maxConcurrent,
      maxQueueSize: options.maxQueueSize,
    });
  }

  /**
   * Start the dispatch loop. Calling it again while running is a no-op.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.dispatchLoop();
  }

  /**
   * Stop dispatching and wait for active slots to finish.
   * Pending requests stay queued.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.signal();
    await this.loop;
    this.loop = null;
    await Promise.all([...this.inFlight]);
    logger.info('🛑 DownloadQueue stopped');
  }

  async enqueue(input: EnqueueInput<T>): Promise<EnqueueResult> {
    const quality = await this.resolveQuality(input);
    const result = await this.lock.runExclusive(() => this.admit(input, quality));

    if (result.status === 'queued') {
      logger.info('📥 Request added to queue', {
        requestId: result.requestId,
        userId: input.requesterId,
        position: result.position,
      });
      this.events.emit(QueueEvents.QUEUED, {
        requestId: result.requestId,
        userId: input.requesterId,
        platform: result.platform,
        position: result.position,
      });
      this.signal();
    } else {
      logger.info('⛔ Request rejected', {
        userId: input.requesterId,
        kind: result.error.kind,
        reason: result.error.reason,
      });
    }
    return result;
  }

  status(): Promise<QueueStatus> {
    return this.lock.runExclusive(() => ({
      pendingCount: this.pending.length,
      activeCount: this.activeCount,
    }));
  }

  /**
   * 1-based position of the user's first pending request
   */
  positionOf(userId: number): Promise<number | null> {
    return this.lock.runExclusive(() => {
      const index = this.pending.findIndex((r) => r.requesterId === userId);
      return index === -1 ? null : index + 1;
    });
  }

  /**
   * Remove every pending request of a user. Active requests run to completion.
   */
  async cancelAllForUser(userId: number): Promise<number> {
    const removed = await this.lock.runExclusive(() => {
      const cancelled: DownloadRequest<T>[] = [];
      for (let i = this.pending.length - 1; i >= 0; i--) {
        if (this.pending[i].requesterId === userId) {
          cancelled.unshift(...this.pending.splice(i, 1));
        }
      }
      cancelled.forEach((r) => this.announcements.delete(r.id));
      this.resolveIdleWaiters();
      return cancelled;
    });

    for (const request of removed) {
      this.events.emit(QueueEvents.CANCELLED, {
        requestId: request.id,
        userId,
        platform: request.platform,
      });
    }
    if (removed.length > 0) {
      logger.info('🗑️ Cancelled pending requests', { userId, count: removed.length });
    }
    return removed.length;
  }

  /**
   * Resolves once nothing is pending or active
   */
  async whenIdle(): Promise<void> {
    const waiter = await this.lock.runExclusive(() =>
      this.isIdle()
        ? null
        : { done: new Promise<void>((resolve) => this.idleWaiters.push(resolve)) },
    );
    if (waiter) await waiter.done;
  }

  // --------------------------------------------------------------------------
  // Admission
  // --------------------------------------------------------------------------

  private async resolveQuality(input: EnqueueInput<T>): Promise<string | null> {
    if (input.qualityOverride !== undefined) {
      return this.isValidQuality(input.qualityOverride) ? input.qualityOverride : null;
    }

    try {
      const preferred = await this.deps.history.getPreferredQuality(input.requesterId);
      if (preferred && this.isValidQuality(preferred)) return preferred;
    } catch (error: unknown) {
      logger.warn('Failed to read preferred quality', {
        userId: input.requesterId,
        error: describeError(error),
      });
    }
    return this.options.defaultQuality;
  }

  private isValidQuality(quality: string): boolean {
    return this.options.validQualityValues.includes(quality);
  }

  private admit(input: EnqueueInput<T>, quality: string | null): EnqueueResult {
    const { rateLimiter, policyGate } = this.deps;

    if (!rateLimiter.check(input.requesterId)) {
      return { status: 'rejected', error: { kind: 'admission_rejected', reason: 'rate_limited' } };
    }

    const verdict = policyGate.validate(input.url);
    if (!verdict.allowed) {
      return { status: 'rejected', error: { kind: 'policy_rejected', reason: verdict.reason } };
    }

    if (this.pending.length >= this.options.maxQueueSize) {
      return { status: 'rejected', error: { kind: 'admission_rejected', reason: 'queue_full' } };
    }

    if (quality === null) {
      return { status: 'rejected', error: { kind: 'admission_rejected', reason: 'invalid_quality' } };
    }

    const request: DownloadRequest<T> = {
      id: uuidv4(),
      requesterId: input.requesterId,
      requesterDisplayName: input.requesterDisplayName,
      url: input.url,
      platform: verdict.platform.platform,
      platformLabel: verdict.platform.label,
      qualityHint: quality,
      priority: input.priority ?? 0,
      submittedAt: this.now(),
      sequence: this.sequence++,
      notifyTarget: input.notifyTarget,
    };

    // Insert after every request of equal or higher priority
    const index = this.pending.findIndex((r) => r.priority < request.priority);
    let position: number;
    if (index === -1) {
      this.pending.push(request);
      position = this.pending.length;
    } else {
      this.pending.splice(index, 0, request);
      position = index + 1;
    }

    rateLimiter.record(input.requesterId);
    this.announcements.set(request.id, this.progress(request, { stage: 'queued', position }));

    return { status: 'queued', position, requestId: request.id, platform: request.platform };
  }

  // --------------------------------------------------------------------------
  // Dispatch
  // --------------------------------------------------------------------------

  private async dispatchLoop(): Promise<void> {
    while (this.running) {
      const claimed = await this.lock.runExclusive(() => this.claimAvailable());
      for (const request of claimed) {
        this.launch(request);
      }
      await this.waitForSignal();
    }
  }

  private claimAvailable(): DownloadRequest<T>[] {
    const claimed: DownloadRequest<T>[] = [];
    while (this.activeCount < this.options.maxConcurrent) {
      const request = this.pending.shift();
      if (!request) break;
      this.activeCount += 1;
      claimed.push(request);
    }
    return claimed;
  }

  private launch(request: DownloadRequest<T>): void {
    const slot = this.runSlot(request);
    this.inFlight.add(slot);
    slot.then(
      () => this.inFlight.delete(slot),
      () => this.inFlight.delete(slot),
    );
  }

  private async runSlot(request: DownloadRequest<T>): Promise<void> {
    try {
      await this.processOne(request);
    } catch (error: unknown) {
      logError(error, { requestId: request.id, stage: 'slot' });
    } finally {
      await this.lock.runExclusive(() => {
        this.activeCount -= 1;
        this.resolveIdleWaiters();
      });
      this.signal();
    }
  }

  private signal(): void {
    if (this.wake) {
      const wake = this.wake;
      this.wake = null;
      wake();
    } else {
      this.wakeRequested = true;
    }
  }

  private waitForSignal(): Promise<void> {
    if (this.wakeRequested) {
      this.wakeRequested = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.activeCount === 0;
  }

  private resolveIdleWaiters(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  // --------------------------------------------------------------------------
  // Processing
  // --------------------------------------------------------------------------

  private async processOne(request: DownloadRequest<T>): Promise<void> {
    await this.announcements.get(request.id);
    this.announcements.delete(request.id);

    logger.info('▶️ Processing request', { requestId: request.id, platform: request.platform });
    this.events.emit(QueueEvents.STARTED, {
      requestId: request.id,
      userId: request.requesterId,
      platform: request.platform,
    });

    await this.progress(request, { stage: 'analyzing' });
    const { analysis, metadata } = await this.analyze(request);

    if (metadata) {
      const verdict = this.deps.policyGate.checkContent(metadata);
      if (!verdict.allowed) {
        await this.fail(request, 'policy_violation', verdict.detail, metadata.title);
        return;
      }
    }

    const [primaryKind, fallbackKind] = selectStrategyOrder(analysis.contentType);
    const { strategies } = this.deps;

    await this.progress(request, {
      stage: 'downloading',
      contentType: analysis.contentType,
      strategy: primaryKind,
    });
    const primary = await this.attempt(strategies[primaryKind], request);
    if (primary.ok) {
      await this.deliver(request, primary);
      return;
    }

    await this.progress(request, {
      stage: 'fallback',
      contentType: analysis.contentType,
      strategy: fallbackKind,
    });
    const fallback = await this.attempt(strategies[fallbackKind], request);
    if (fallback.ok) {
      await this.deliver(request, fallback);
      return;
    }

    const final = moreSpecific(primary, fallback);
    await this.fail(request, final.classification, final.message, metadata?.title);
  }

  private async analyze(request: DownloadRequest<T>): Promise<Analyzed> {
    const { engine, analyzer } = this.deps;
    try {
      const metadata = await engine.extract(request.url);
      const analysis = analyzer.analyze(metadata, request.platform);
      logger.debug('Content analyzed', {
        requestId: request.id,
        contentType: analysis.contentType,
        confidence: analysis.confidence,
      });
      return { analysis, metadata };
    } catch (error: unknown) {
      logger.warn('Metadata probe failed, guessing from URL', {
        requestId: request.id,
        error: describeError(error),
      });
      return { analysis: analyzer.analyzeUrl(request.url, request.platform) };
    }
  }

  private async attempt(
    strategy: ExtractionStrategy,
    request: DownloadRequest<T>,
  ): Promise<StrategyResult> {
    try {
      return await strategy.fetch(request.url, request.platform, request.qualityHint);
    } catch (error: unknown) {
      logError(error, { requestId: request.id, strategy: strategy.kind });
      return {
        ok: false,
        classification: 'generic_extraction_error',
        message: describeError(error),
      };
    }
  }

  private async deliver(request: DownloadRequest<T>, result: StrategySuccess): Promise<void> {
    const { notifier } = this.deps;
    try {
      await this.progress(request, { stage: 'uploading' });
      try {
        await notifier.sendResult(
          request.notifyTarget,
          result.filePath,
          result.title,
          request.platformLabel,
        );
      } catch (error: unknown) {
        logError(error, { requestId: request.id, stage: 'delivery' });
        await this.fail(request, 'delivery_failed', describeError(error), result.title);
        return;
      }

      await this.record(request, { success: true, title: result.title, sizeBytes: result.sizeBytes });
      logger.info('✅ Request completed', { requestId: request.id, sizeBytes: result.sizeBytes });
      this.events.emit(QueueEvents.SUCCEEDED, {
        requestId: request.id,
        userId: request.requesterId,
        platform: request.platform,
      });
    } finally {
      await result.release();
    }
  }

  private async fail(
    request: DownloadRequest<T>,
    classification: NotifyClassification,
    message: string,
    title?: string,
  ): Promise<void> {
    logger.warn('❌ Request failed', { requestId: request.id, classification, message });
    try {
      await this.deps.notifier.sendError(request.notifyTarget, classification, message);
    } catch (error: unknown) {
      logError(error, { requestId: request.id, stage: 'notify_error' });
    }

    await this.record(request, { success: false, title: title ?? '', errorMessage: message });
    this.events.emit(QueueEvents.FAILED, {
      requestId: request.id,
      userId: request.requesterId,
      platform: request.platform,
      classification,
      message,
    });
  }

  private async record(
    request: DownloadRequest<T>,
    outcome: { success: boolean; title: string; sizeBytes?: number; errorMessage?: string },
  ): Promise<void> {
    try {
      await this.deps.history.record({
        userId: request.requesterId,
        username: request.requesterDisplayName,
        url: request.url,
        platform: request.platform,
        ...outcome,
      });
    } catch (error: unknown) {
      logError(error, { requestId: request.id, stage: 'history' });
    }
  }

  private async progress(request: DownloadRequest<T>, update: ProgressUpdate): Promise<void> {
    try {
      await this.deps.notifier.sendProgress(request.notifyTarget, update);
    } catch (error: unknown) {
      logger.debug('Progress update failed', {
        requestId: request.id,
        error: describeError(error),
      });
    }
  }
}

/**
 * A strategy that never ran ranks below any real attempt; otherwise the
 * fallback's classification wins only when the primary failure was generic
 */
function moreSpecific(primary: StrategyFailure, fallback: StrategyFailure): StrategyFailure {
  if (primary.skipped) return fallback;
  if (fallback.skipped) return primary;
  return primary.classification === 'generic_extraction_error' ? fallback : primary;
}
