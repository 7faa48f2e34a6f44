import { Injectable, Logger } from '@nestjs/common';
import { JobsService } from '../../jobs/jobs.service/jobs.service';
import { JobStatus } from '../../jobs/constants/job-status.enum';
import { BillingService } from '../../billing/billing.service/billing.service';
import { KieService } from '../../kie/kie.service/kie.service';
import { KieApiError } from '../../kie/kie.errors';
import { SubmissionFailedError, describeError } from '../../common/errors';

// Параметры запроса уже проверены вызывающим кодом
export interface GenerationRequest {
  model: string;
  input: Record<string, unknown>;
  price?: number;
  // повторный submit с тем же ключом вернёт уже созданную задачу
  idempotencyKey?: string;
}

@Injectable()
export class GenerationService {
  private readonly logger = new Logger(GenerationService.name);

  constructor(
    private readonly jobs: JobsService,
    private readonly billing: BillingService,
    private readonly kie: KieService,
  ) {}

  /**
   * Создаёт задачу в статусе pending, замораживает токены и отправляет запрос провайдеру.
   * Строка задачи создаётся до внешнего вызова.
   * @returns ID созданной задачи
   * @throws InsufficientFundsError если не хватает токенов
   * @throws SubmissionFailedError если провайдер отклонил запрос или недоступен
   */
  async submit(userId: string, chatId: string, request: GenerationRequest): Promise<string> {
    if (request.idempotencyKey) {
      const existing = await this.jobs.findByIdempotencyKey(request.idempotencyKey);
      if (existing) {
        this.logger.log(`Повторный запрос ${request.idempotencyKey}, возвращаю задачу ${existing.id}`);
        return existing.id;
      }
    }

    const job = await this.jobs.create({
      userId,
      chatId,
      model: request.model,
      input: request.input,
      price: request.price ?? 0,
      idempotencyKey: request.idempotencyKey ?? null,
    });

    if (job.price > 0) {
      try {
        await this.billing.holdForJob(job);
      } catch (error) {
        await this.jobs.transition(job.id, JobStatus.FAILED, { errorText: describeError(error) });
        throw error;
      }
    }

    let taskId: string;
    try {
      taskId = await this.kie.createTask(job.model, job.input);
    } catch (error) {
      const reason = describeError(error);
      this.logger.error(`Не удалось отправить задачу ${job.id} провайдеру: ${reason}`);
      await this.jobs.transition(job.id, JobStatus.FAILED, { errorText: reason });
      if (job.price > 0) {
        await this.billing.releaseForJob(job);
      }
      const userMessage = error instanceof KieApiError ? error.userMessage : 'Не удалось запустить генерацию. Попробуйте позже.';
      throw new SubmissionFailedError(job.id, reason, userMessage);
    }

    await this.jobs.attachTaskId(job.id, taskId);
    this.logger.log(`Задача ${job.id} отправлена провайдеру, task=${taskId}`);
    return job.id;
  }
}
