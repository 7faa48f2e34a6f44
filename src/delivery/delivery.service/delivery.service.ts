import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectBot } from 'nestjs-telegraf';
import { Context, Telegraf } from 'telegraf';
import { JobsService } from '../../jobs/jobs.service/jobs.service';
import { GenerationJob } from '../../jobs/entities/generation-job.entity';
import { JobStatus } from '../../jobs/constants/job-status.enum';
import { describeError } from '../../common/errors';
import { readNumber } from '../../common/config';
import { detectMediaKind } from '../media-kind';

/**
 * Отправка готовых результатов в Telegram.
 * Перед отправкой доставка захватывается в БД, поэтому callback и сверка
 * не отправят один результат одновременно. Флаг delivered ставится только
 * после подтверждённой отправки; при ошибке задача остаётся кандидатом на повтор.
 */
@Injectable()
export class DeliveryService {
  private readonly logger = new Logger(DeliveryService.name);
  // срок захвата доставки, после него задачу может взять другой процесс
  private readonly claimTtlMs: number;

  constructor(
    @InjectBot() private readonly bot: Telegraf<Context>,
    private readonly jobs: JobsService,
    private readonly cfg: ConfigService,
  ) {
    this.claimTtlMs = readNumber(this.cfg, 'DELIVERY_CLAIM_TTL_MS', 5 * 60 * 1000);
  }

  /** Возвращает true, если результат отправлен пользователю */
  async deliver(job: GenerationJob): Promise<boolean> {
    if (job.status !== JobStatus.DONE || job.resultUrls.length === 0) {
      this.logger.warn(`Задача ${job.id} не готова к доставке (статус ${job.status}, ссылок ${job.resultUrls.length})`);
      return false;
    }
    if (job.delivered) {
      this.logger.debug(`Задача ${job.id} уже доставлена`);
      return false;
    }

    try {
      if (!(await this.jobs.claimDelivery(job.id, this.claimTtlMs))) {
        this.logger.debug(`Задача ${job.id} уже доставляется или доставлена`);
        return false;
      }
    } catch (error) {
      this.logger.error(`Не удалось захватить доставку задачи ${job.id}`, describeError(error));
      return false;
    }

    const progress = { sent: job.sentCount };
    try {
      await this.sendResult(job, progress);
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn(`Не удалось доставить задачу ${job.id} в чат ${job.chatId}: ${reason}`);
      try {
        await this.jobs.recordDeliveryFailure(job.id, reason, progress.sent);
      } catch (saveError) {
        this.logger.error(`Не удалось сохранить ошибку доставки задачи ${job.id}`, describeError(saveError));
      }
      return false;
    }

    try {
      if (!(await this.jobs.markDelivered(job.id))) {
        this.logger.warn(`Задача ${job.id} отправлена, но уже была отмечена доставленной`);
      }
    } catch (error) {
      // сообщение ушло; при следующей сверке возможна повторная отправка
      this.logger.error(`Задача ${job.id} отправлена, но флаг доставки не сохранён`, describeError(error));
    }
    this.logger.log(`Результат задачи ${job.id} доставлен в чат ${job.chatId}`);
    return true;
  }

  // Сообщение пользователю о неудачной генерации; ошибки отправки только логируются
  async notifyFailure(job: GenerationJob): Promise<boolean> {
    const reason = job.errorText ? `: ${job.errorText}` : '';
    try {
      await this.bot.telegram.sendMessage(job.chatId, `Не удалось выполнить генерацию${reason}\nID: ${job.id}`);
      return true;
    } catch (error) {
      this.logger.warn(`Не удалось сообщить об ошибке задачи ${job.id}: ${describeError(error)}`);
      return false;
    }
  }

  // Продолжает с progress.sent: ссылки, ушедшие в прошлой попытке, не повторяются
  private async sendResult(job: GenerationJob, progress: { sent: number }): Promise<void> {
    const caption = `Генерация готова\nID: ${job.id}`;
    const first = progress.sent;
    try {
      for (; progress.sent < job.resultUrls.length; progress.sent++) {
        const url = job.resultUrls[progress.sent];
        await this.sendMedia(job.chatId, url, progress.sent === first ? caption : undefined);
      }
    } catch (error) {
      // Telegram не смог забрать файл по ссылке, оставшиеся ссылки отправляем текстом
      this.logger.warn(`Медиа задачи ${job.id} не отправлено, отправляю ссылки: ${describeError(error)}`);
      const rest = job.resultUrls.slice(progress.sent);
      const header = progress.sent === first ? caption : `Остальные результаты\nID: ${job.id}`;
      await this.bot.telegram.sendMessage(job.chatId, [header, '', ...rest].join('\n'));
      progress.sent = job.resultUrls.length;
    }
  }

  private async sendMedia(chatId: string, url: string, caption?: string): Promise<void> {
    const extra = caption ? { caption } : undefined;
    switch (detectMediaKind(url)) {
      case 'photo':
        await this.bot.telegram.sendPhoto(chatId, url, extra);
        return;
      case 'video':
        await this.bot.telegram.sendVideo(chatId, url, extra);
        return;
      case 'audio':
        await this.bot.telegram.sendAudio(chatId, url, extra);
        return;
      default:
        await this.bot.telegram.sendDocument(chatId, url, extra);
    }
  }
}
