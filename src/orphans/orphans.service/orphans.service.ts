import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { OrphanCallback } from '../entities/orphan-callback.entity';
import { CallbackStatus, KieCallbackOutcome, isTerminalCallback } from '../../kie/kie-callback.parser';

const TERMINAL_STATUSES: CallbackStatus[] = ['success', 'fail'];

/**
 * Журнал «осиротевших» callback-ов: уведомления, пришедшие раньше,
 * чем задача сохранила свой task id (или вовсе без задачи).
 * Обработанные записи не удаляются и остаются для аудита.
 */
@Injectable()
export class OrphansService {
  private readonly logger = new Logger(OrphansService.name);

  constructor(
    @InjectRepository(OrphanCallback)
    private readonly orphanRepo: Repository<OrphanCallback>,
  ) {}

  /**
   * Сохраняет уведомление атомарно: INSERT без конфликта, затем условный UPDATE.
   * Промежуточный статус не затирает ещё не обработанный итог, даже если
   * уведомления пришли одновременно. Возвращает false, если уведомление пропущено.
   */
  async store(outcome: KieCallbackOutcome, receivedAt = new Date()): Promise<boolean> {
    const payload = JSON.stringify(outcome);
    const row: QueryDeepPartialEntity<OrphanCallback> = {
      status: outcome.status,
      payload: () => ':payload',
      receivedAt,
      processed: false,
      processedAt: null,
      outcome: null,
      error: null,
    };

    await this.orphanRepo
      .createQueryBuilder()
      .insert()
      .into(OrphanCallback)
      .values({ taskId: outcome.taskId, ...row })
      .orIgnore()
      .setParameter('payload', payload)
      .updateEntity(false)
      .execute();

    const update = this.orphanRepo
      .createQueryBuilder()
      .update(OrphanCallback)
      .set(row)
      .where('task_id = :taskId', { taskId: outcome.taskId })
      .setParameter('payload', payload)
      .updateEntity(false);
    if (!isTerminalCallback(outcome.status)) {
      update.andWhere('NOT (processed = :open AND status IN (:...terminal))', {
        open: false,
        terminal: TERMINAL_STATUSES,
      });
    }
    const result = await update.execute();

    if ((result.affected ?? 0) === 0) {
      this.logger.debug(`Сирота task=${outcome.taskId} уже содержит итог, ${outcome.status} пропущен`);
      return false;
    }
    this.logger.log(`Сохранён callback без задачи: task=${outcome.taskId}, статус ${outcome.status}`);
    return true;
  }

  findByTaskId(taskId: string): Promise<OrphanCallback | null> {
    return this.orphanRepo.findOne({ where: { taskId } });
  }

  // Необработанные сироты, старые первыми
  listPending(limit: number): Promise<OrphanCallback[]> {
    return this.orphanRepo.find({
      where: { processed: false },
      order: { receivedAt: 'ASC' },
      take: limit,
    });
  }

  async markMatched(taskId: string): Promise<boolean> {
    const result = await this.orphanRepo.update(
      { taskId, processed: false },
      { processed: true, processedAt: new Date(), outcome: 'matched', error: null },
    );
    return (result.affected ?? 0) > 0;
  }

  async markExpired(taskId: string, reason: string): Promise<boolean> {
    const result = await this.orphanRepo.update(
      { taskId, processed: false },
      { processed: true, processedAt: new Date(), outcome: 'expired', error: reason },
    );
    return (result.affected ?? 0) > 0;
  }
}
