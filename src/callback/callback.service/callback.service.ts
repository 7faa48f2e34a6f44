import { Injectable, Logger } from '@nestjs/common';
import { JobsService } from '../../jobs/jobs.service/jobs.service';
import { GenerationJob } from '../../jobs/entities/generation-job.entity';
import { JobStatus, isTerminalStatus } from '../../jobs/constants/job-status.enum';
import { OrphansService } from '../../orphans/orphans.service/orphans.service';
import { DeliveryService } from '../../delivery/delivery.service/delivery.service';
import { BillingService } from '../../billing/billing.service/billing.service';
import { LeaseService } from '../../leadership/lease.service/lease.service';
import { CallbackStatus, KieCallbackOutcome } from '../../kie/kie-callback.parser';
import { describeError } from '../../common/errors';

export interface CallbackResultPayload {
  resultUrls?: string[];
  error?: string | null;
  raw?: unknown;
}

// applied: статус задачи изменён этим вызовом; duplicate: повтор или устаревшее уведомление
export type ApplyResult = 'applied' | 'duplicate';

@Injectable()
export class CallbackService {
  private readonly logger = new Logger(CallbackService.name);

  constructor(
    private readonly jobs: JobsService,
    private readonly orphans: OrphansService,
    private readonly delivery: DeliveryService,
    private readonly billing: BillingService,
    private readonly lease: LeaseService,
  ) {}

  /**
   * Обрабатывает уведомление провайдера. Повторные уведомления безопасны.
   * Исключения не пробрасываются, только логируются.
   */
  async onCallback(taskId: string, status: CallbackStatus, result: CallbackResultPayload = {}): Promise<void> {
    const outcome: KieCallbackOutcome = {
      taskId,
      status,
      resultUrls: result.resultUrls ?? [],
      error: result.error ?? null,
      raw: result.raw ?? null,
    };

    try {
      if (!this.lease.isActive()) {
        // пассивный экземпляр только сохраняет уведомление, сверку выполнит активный
        await this.orphans.store(outcome);
        return;
      }

      const job = await this.jobs.findByTaskId(taskId);
      if (!job) {
        this.logger.warn(`Callback для неизвестной задачи task=${taskId}, сохраняю для сверки`);
        await this.orphans.store(outcome);
        return;
      }

      await this.applyOutcome(job, outcome);
    } catch (error) {
      this.logger.error(`Ошибка обработки callback task=${taskId}`, error instanceof Error ? error.stack : String(error));
    }
  }

  /**
   * Применяет итог провайдера к задаче. Используется и при получении callback-а,
   * и при сверке сирот. Доставку или уведомление об ошибке запускает только
   * тот вызов, который выполнил переход статуса.
   */
  async applyOutcome(job: GenerationJob, outcome: KieCallbackOutcome): Promise<ApplyResult> {
    if (isTerminalStatus(job.status)) {
      this.logger.log(`Повторный callback task=${outcome.taskId}: задача ${job.id} уже в статусе ${job.status}`);
      return 'duplicate';
    }

    if (outcome.status === 'running') {
      if (job.status === JobStatus.RUNNING) return 'duplicate';
      return (await this.jobs.transition(job.id, JobStatus.RUNNING)) ? 'applied' : 'duplicate';
    }

    if (outcome.status === 'success' && outcome.resultUrls.length > 0) {
      if (!(await this.jobs.transition(job.id, JobStatus.DONE, { resultUrls: outcome.resultUrls }))) {
        return 'duplicate';
      }
      await this.settle(job, 'capture');
      const done = await this.jobs.findById(job.id);
      if (done) await this.delivery.deliver(done);
      return 'applied';
    }

    const errorText = outcome.error ?? 'Провайдер не вернул результат';
    if (!(await this.jobs.transition(job.id, JobStatus.FAILED, { errorText }))) {
      return 'duplicate';
    }
    this.logger.warn(`Задача ${job.id} завершилась ошибкой провайдера: ${errorText}`);
    await this.settle(job, 'release');
    const failed = await this.jobs.findById(job.id);
    if (failed) await this.delivery.notifyFailure(failed);
    return 'applied';
  }

  // Ошибка расчётов не должна мешать доставке результата
  private async settle(job: GenerationJob, action: 'capture' | 'release'): Promise<void> {
    if (job.price <= 0) return;
    try {
      if (action === 'capture') await this.billing.captureForJob(job);
      else await this.billing.releaseForJob(job);
    } catch (error) {
      this.logger.error(`Не удалось выполнить ${action} для задачи ${job.id}`, describeError(error));
    }
  }
}
