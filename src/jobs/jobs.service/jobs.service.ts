import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { randomUUID } from 'crypto';
import { In, LessThan, Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { GenerationJob } from '../entities/generation-job.entity';
import { ACTIVE_JOB_STATUSES, JobStatus, isTerminalStatus } from '../constants/job-status.enum';
import { InvalidJobStateError } from '../../common/errors';

export interface NewJob {
  userId: string;
  chatId: string;
  model: string;
  input: Record<string, unknown>;
  price?: number;
  idempotencyKey?: string | null;
}

export interface TransitionPatch {
  resultUrls?: string[];
  errorText?: string | null;
}

// Из каких статусов разрешён переход в целевой
const ALLOWED_SOURCES: Record<JobStatus, JobStatus[]> = {
  [JobStatus.PENDING]: [],
  [JobStatus.RUNNING]: [JobStatus.PENDING],
  [JobStatus.DONE]: [JobStatus.PENDING, JobStatus.RUNNING],
  [JobStatus.FAILED]: [JobStatus.PENDING, JobStatus.RUNNING],
};

/**
 * Хранилище задач генерации.
 * Все изменения: однострочные UPDATE с условием по текущему статусу,
 * поэтому конкурирующие callback-и не могут перевести задачу дважды.
 */
@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    @InjectRepository(GenerationJob)
    private readonly jobRepo: Repository<GenerationJob>,
  ) {}

  async create(data: NewJob): Promise<GenerationJob> {
    const job = this.jobRepo.create({
      id: randomUUID(),
      taskId: null,
      userId: data.userId,
      chatId: data.chatId,
      model: data.model,
      input: data.input,
      status: JobStatus.PENDING,
      resultUrls: [],
      errorText: null,
      price: data.price ?? 0,
      idempotencyKey: data.idempotencyKey ?? null,
      delivered: false,
      deliveredAt: null,
      deliveryAttempts: 0,
      lastDeliveryError: null,
      deliveryClaimedUntil: null,
      sentCount: 0,
      finishedAt: null,
    });
    const saved = await this.jobRepo.save(job);
    this.logger.log(`Создана задача ${saved.id} для пользователя ${saved.userId} (модель ${saved.model})`);
    return saved;
  }

  findById(id: string): Promise<GenerationJob | null> {
    return this.jobRepo.findOne({ where: { id } });
  }

  findByTaskId(taskId: string): Promise<GenerationJob | null> {
    return this.jobRepo.findOne({ where: { taskId } });
  }

  findByIdempotencyKey(idempotencyKey: string): Promise<GenerationJob | null> {
    return this.jobRepo.findOne({ where: { idempotencyKey } });
  }

  async attachTaskId(jobId: string, taskId: string): Promise<void> {
    await this.jobRepo.update({ id: jobId }, { taskId });
    this.logger.debug(`Задаче ${jobId} присвоен task_id ${taskId}`);
  }

  /**
   * Переводит задачу в новый статус, если текущий статус это допускает.
   * Возвращает false, если задача уже в конечном статусе или переход выполнил кто-то другой.
   */
  async transition(jobId: string, status: JobStatus, patch: TransitionPatch = {}): Promise<boolean> {
    const resultUrls = patch.resultUrls ?? [];
    if (status === JobStatus.DONE && resultUrls.length === 0) {
      throw new InvalidJobStateError(`Задача ${jobId} не может быть выполнена без ссылок на результат`);
    }
    if (status !== JobStatus.DONE && resultUrls.length > 0) {
      throw new InvalidJobStateError(`Ссылки на результат допустимы только для статуса done (задача ${jobId})`);
    }
    const sources = ALLOWED_SOURCES[status];
    if (sources.length === 0) {
      throw new InvalidJobStateError(`Переход задачи ${jobId} в статус ${status} запрещён`);
    }

    const update: QueryDeepPartialEntity<GenerationJob> = { status, resultUrls };
    if (patch.errorText !== undefined) update.errorText = patch.errorText;
    if (isTerminalStatus(status)) update.finishedAt = new Date();

    const result = await this.jobRepo.update({ id: jobId, status: In(sources) }, update);
    const moved = (result.affected ?? 0) > 0;
    if (moved) {
      this.logger.log(`Задача ${jobId} → ${status}`);
    } else {
      this.logger.debug(`Переход задачи ${jobId} в ${status} не выполнен: статус уже изменён`);
    }
    return moved;
  }

  /**
   * Общая операция обновления: статус, ссылки и флаг доставки.
   * Флаг delivered можно поставить только выполненной задаче.
   */
  async updateJobStatus(jobId: string, status: JobStatus, resultUrls?: string[], delivered?: boolean): Promise<boolean> {
    if (delivered && status !== JobStatus.DONE) {
      throw new InvalidJobStateError(`Нельзя отметить доставленной задачу ${jobId} в статусе ${status}`);
    }
    if (resultUrls?.length && status !== JobStatus.DONE) {
      throw new InvalidJobStateError(`Ссылки на результат допустимы только для статуса done (задача ${jobId})`);
    }

    const job = await this.findById(jobId);
    if (!job) return false;

    if (job.status !== status && !(await this.transition(jobId, status, { resultUrls }))) {
      return false;
    }
    if (delivered) {
      return this.markDelivered(jobId);
    }
    return true;
  }

  /**
   * Захватывает доставку на ttlMs. Успешен только один из конкурирующих
   * вызовов; захват с истёкшим сроком (упавший процесс) можно перехватить.
   */
  async claimDelivery(jobId: string, ttlMs: number, now = new Date()): Promise<boolean> {
    const result = await this.jobRepo
      .createQueryBuilder()
      .update(GenerationJob)
      .set({ deliveryClaimedUntil: new Date(now.getTime() + ttlMs) })
      .where('id = :id', { id: jobId })
      .andWhere('status = :status', { status: JobStatus.DONE })
      .andWhere('delivered = :delivered', { delivered: false })
      .andWhere('(delivery_claimed_until IS NULL OR delivery_claimed_until < :now)', { now })
      .updateEntity(false)
      .execute();
    return (result.affected ?? 0) > 0;
  }

  // Флаг ставится только у выполненной и ещё не доставленной задачи
  async markDelivered(jobId: string): Promise<boolean> {
    const result = await this.jobRepo.update(
      { id: jobId, status: JobStatus.DONE, delivered: false },
      { delivered: true, deliveredAt: new Date(), deliveryClaimedUntil: null },
    );
    return (result.affected ?? 0) > 0;
  }

  /**
   * Неудачная попытка: счётчик попыток, текст ошибки и снятие захвата.
   * sentCount сохраняет, сколько ссылок уже отправлено, чтобы повтор начал с остальных.
   */
  async recordDeliveryFailure(jobId: string, error: string, sentCount?: number): Promise<void> {
    const update: QueryDeepPartialEntity<GenerationJob> = {
      deliveryAttempts: () => 'delivery_attempts + 1',
      lastDeliveryError: error.slice(0, 1000),
      deliveryClaimedUntil: null,
    };
    if (sentCount !== undefined) update.sentCount = sentCount;
    await this.jobRepo.update({ id: jobId }, update);
  }

  /** Выполненные, но не доставленные задачи, кандидаты на повторную отправку */
  getUndeliveredJobs(limit: number, maxAttempts?: number): Promise<GenerationJob[]> {
    return this.jobRepo.find({
      where: {
        status: JobStatus.DONE,
        delivered: false,
        ...(maxAttempts !== undefined ? { deliveryAttempts: LessThan(maxAttempts) } : {}),
      },
      order: { finishedAt: 'ASC' },
      take: limit,
    });
  }

  // Незавершённые задачи, созданные раньше olderThan
  findStale(olderThan: Date, limit: number): Promise<GenerationJob[]> {
    return this.jobRepo.find({
      where: { status: In([...ACTIVE_JOB_STATUSES]), createdAt: LessThan(olderThan) },
      order: { createdAt: 'ASC' },
      take: limit,
    });
  }

  listUserJobs(userId: string, limit = 10): Promise<GenerationJob[]> {
    return this.jobRepo.find({
      where: { userId },
      order: { createdAt: 'DESC' },
      take: limit,
    });
  }
}
