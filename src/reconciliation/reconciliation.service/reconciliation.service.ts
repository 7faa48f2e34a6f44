import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JobsService } from '../../jobs/jobs.service/jobs.service';
import { JobStatus } from '../../jobs/constants/job-status.enum';
import { GenerationJob } from '../../jobs/entities/generation-job.entity';
import { OrphansService } from '../../orphans/orphans.service/orphans.service';
import { OrphanCallback } from '../../orphans/entities/orphan-callback.entity';
import { CallbackService } from '../../callback/callback.service/callback.service';
import { DeliveryService } from '../../delivery/delivery.service/delivery.service';
import { BillingService } from '../../billing/billing.service/billing.service';
import { LeaseService, RECONCILER_LEASE } from '../../leadership/lease.service/lease.service';
import { readNumber } from '../../common/config';
import { describeError } from '../../common/errors';

export interface ReconcileReport {
  // сироты, сопоставленные с задачами
  matched: number;
  // сироты, так и не дождавшиеся задачи
  expired: number;
  // результаты, доставленные повторной отправкой
  redelivered: number;
  // задачи, переведённые в failed по таймауту
  timedOut: number;
}

/**
 * Фоновая сверка: сопоставляет сирот с задачами, повторяет доставку
 * и закрывает зависшие задачи. Работает только на экземпляре, владеющем арендой.
 */
@Injectable()
export class ReconciliationService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ReconciliationService.name);
  private readonly intervalMs: number;
  private readonly batchLimit: number;
  private readonly orphanExpiryMs: number;
  private readonly jobTimeoutMs: number;
  private readonly maxDeliveryAttempts: number;
  private readonly leaseTtlMs: number;
  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(
    private readonly jobs: JobsService,
    private readonly orphans: OrphansService,
    private readonly callbacks: CallbackService,
    private readonly delivery: DeliveryService,
    private readonly billing: BillingService,
    private readonly lease: LeaseService,
    private readonly cfg: ConfigService,
  ) {
    this.intervalMs = readNumber(this.cfg, 'RECONCILE_INTERVAL_MS', 60_000);
    this.batchLimit = readNumber(this.cfg, 'RECONCILE_BATCH_LIMIT', 50);
    this.orphanExpiryMs = readNumber(this.cfg, 'ORPHAN_EXPIRY_MS', 60 * 60 * 1000);
    this.jobTimeoutMs = readNumber(this.cfg, 'JOB_TIMEOUT_MS', 2 * 60 * 60 * 1000);
    this.maxDeliveryAttempts = readNumber(this.cfg, 'DELIVERY_MAX_ATTEMPTS', 10);
    this.leaseTtlMs = readNumber(this.cfg, 'LEADER_LEASE_TTL_MS', this.intervalMs * 3);
  }

  onModuleInit() {
    if (this.intervalMs <= 0) {
      this.logger.warn('Сверка отключена (RECONCILE_INTERVAL_MS <= 0)');
      return;
    }
    this.timer = setInterval(() => this.runTick(), this.intervalMs);
    this.timer.unref();
    this.runTick();
    this.logger.log(`Сверка запущена, интервал ${this.intervalMs} мс`);
  }

  async onModuleDestroy() {
    if (this.timer) clearInterval(this.timer);
    if (this.lease.isActive()) {
      await this.lease.release(RECONCILER_LEASE);
    }
  }

  /**
   * Один шаг цикла. Пропускается, если предыдущий шаг ещё выполняется
   * или аренду держит другой экземпляр.
   */
  async tick(now = new Date()): Promise<ReconcileReport | null> {
    if (this.running) {
      this.logger.debug('Предыдущая сверка ещё выполняется, шаг пропущен');
      return null;
    }
    this.running = true;
    try {
      if (!(await this.lease.acquire(RECONCILER_LEASE, this.leaseTtlMs, now))) {
        return null;
      }
      return await this.reconcile(this.batchLimit, now);
    } finally {
      this.running = false;
    }
  }

  async reconcile(batchLimit = this.batchLimit, now = new Date()): Promise<ReconcileReport> {
    const report: ReconcileReport = { matched: 0, expired: 0, redelivered: 0, timedOut: 0 };
    // задачи, которые уже пытались доставить в этой сверке
    const attempted = new Set<string>();
    await this.reconcileOrphans(batchLimit, now, report, attempted);
    await this.retryDeliveries(batchLimit, report, attempted);
    await this.failStaleJobs(batchLimit, now, report);

    if (report.matched || report.expired || report.redelivered || report.timedOut) {
      this.logger.log(
        `Сверка: сопоставлено ${report.matched}, просрочено ${report.expired}, доставлено повторно ${report.redelivered}, таймаут ${report.timedOut}`,
      );
    }
    return report;
  }

  private runTick() {
    this.tick().catch((error) => {
      this.logger.error('Ошибка цикла сверки', describeError(error));
    });
  }

  private async reconcileOrphans(batchLimit: number, now: Date, report: ReconcileReport, attempted: Set<string>) {
    let pending: OrphanCallback[];
    try {
      pending = await this.orphans.listPending(batchLimit);
    } catch (error) {
      this.logger.error('Не удалось получить список сирот', describeError(error));
      return;
    }

    for (const orphan of pending) {
      try {
        const job = await this.jobs.findByTaskId(orphan.taskId);
        if (job) {
          attempted.add(job.id);
          const result = await this.callbacks.applyOutcome(job, orphan.payload);
          await this.orphans.markMatched(orphan.taskId);
          report.matched++;
          this.logger.log(`Сирота task=${orphan.taskId} сопоставлена с задачей ${job.id} (${result})`);
          continue;
        }

        const ageMs = now.getTime() - orphan.receivedAt.getTime();
        if (ageMs > this.orphanExpiryMs) {
          const reason = `Задача не найдена за ${Math.round(ageMs / 1000)} с`;
          if (await this.orphans.markExpired(orphan.taskId, reason)) {
            report.expired++;
            // результат провайдера потерян, пользователь его не получит
            this.logger.error(`Результат потерян: task=${orphan.taskId}, статус ${orphan.payload.status}. ${reason}`);
          }
        }
      } catch (error) {
        this.logger.error(`Ошибка сверки сироты task=${orphan.taskId}`, describeError(error));
      }
    }
  }

  private async retryDeliveries(batchLimit: number, report: ReconcileReport, attempted: Set<string>) {
    let undelivered: GenerationJob[];
    try {
      undelivered = await this.jobs.getUndeliveredJobs(batchLimit, this.maxDeliveryAttempts);
    } catch (error) {
      this.logger.error('Не удалось получить недоставленные задачи', describeError(error));
      return;
    }

    for (const job of undelivered) {
      if (attempted.has(job.id)) continue;
      attempted.add(job.id);
      if (await this.delivery.deliver(job)) {
        report.redelivered++;
      }
    }
  }

  private async failStaleJobs(batchLimit: number, now: Date, report: ReconcileReport) {
    const olderThan = new Date(now.getTime() - this.jobTimeoutMs);
    let stale: GenerationJob[];
    try {
      stale = await this.jobs.findStale(olderThan, batchLimit);
    } catch (error) {
      this.logger.error('Не удалось получить зависшие задачи', describeError(error));
      return;
    }

    for (const job of stale) {
      try {
        const errorText = 'Превышено время ожидания результата';
        if (!(await this.jobs.transition(job.id, JobStatus.FAILED, { errorText }))) continue;
        report.timedOut++;
        this.logger.warn(`Задача ${job.id} (task=${job.taskId ?? 'нет'}) закрыта по таймауту`);
        if (job.price > 0) await this.billing.releaseForJob(job);
        await this.delivery.notifyFailure({ ...job, status: JobStatus.FAILED, errorText });
      } catch (error) {
        this.logger.error(`Ошибка закрытия зависшей задачи ${job.id}`, describeError(error));
      }
    }
  }
}
