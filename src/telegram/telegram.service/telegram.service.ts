import { Injectable, Logger } from '@nestjs/common';
import { InjectBot } from 'nestjs-telegraf';
import { Telegraf, Context } from 'telegraf';
import { ConfigService } from '@nestjs/config';
import { GenerationService } from '../../generation/generation.service/generation.service';
import { JobsService } from '../../jobs/jobs.service/jobs.service';
import { JobStatus } from '../../jobs/constants/job-status.enum';
import { BillingService } from '../../billing/billing.service/billing.service';
import { InsufficientFundsError, SubmissionFailedError, describeError } from '../../common/errors';
import { readNumber } from '../../common/config';

// подписи статусов для списка задач
const STATUS_LABELS: Record<JobStatus, string> = {
  [JobStatus.PENDING]: 'в очереди',
  [JobStatus.RUNNING]: 'выполняется',
  [JobStatus.DONE]: 'готово',
  [JobStatus.FAILED]: 'ошибка',
};

@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);
  // модель и стоимость генерации по умолчанию
  private readonly defaultModel: string;
  private readonly defaultPrice: number;

  constructor(
    @InjectBot() private readonly bot: Telegraf<Context>,
    private readonly generation: GenerationService,
    private readonly jobs: JobsService,
    private readonly billing: BillingService,
    private readonly cfg: ConfigService,
  ) {
    this.defaultModel = this.cfg.get<string>('DEFAULT_MODEL') || 'google/nano-banana';
    this.defaultPrice = readNumber(this.cfg, 'DEFAULT_PRICE', 60);
    this.registerHandlers();
  }

  /**
   * Запускает генерацию по тексту команды и возвращает ответ для пользователя.
   * Ключ идемпотентности строится из сообщения, поэтому повторная доставка
   * того же update не создаст вторую задачу.
   */
  async startGeneration(userId: string, chatId: string, prompt: string, messageId: number): Promise<string> {
    if (!prompt) {
      return 'Опишите, что нужно сгенерировать: /generate <описание>';
    }

    try {
      const jobId = await this.generation.submit(userId, chatId, {
        model: this.defaultModel,
        input: { prompt },
        price: this.defaultPrice,
        idempotencyKey: `tg:${chatId}:${messageId}`,
      });
      return `Задача принята, результат придёт сюда.\nID: ${jobId}`;
    } catch (error) {
      if (error instanceof InsufficientFundsError) {
        return `Недостаточно токенов: нужно ${error.required}, доступно ${error.available}.`;
      }
      if (error instanceof SubmissionFailedError) {
        return `${error.userMessage}\nID: ${error.jobId}`;
      }
      this.logger.error(`Ошибка запуска генерации для ${userId}`, describeError(error));
      return 'Не удалось запустить генерацию. Попробуйте позже.';
    }
  }

  async describeJobs(userId: string): Promise<string> {
    const jobs = await this.jobs.listUserJobs(userId, 10);
    if (jobs.length === 0) {
      return 'У вас пока нет задач.';
    }
    const lines = jobs.map((job) => {
      const suffix = job.status === JobStatus.FAILED && job.errorText ? ` (${job.errorText})` : '';
      return `• ${job.id}: ${STATUS_LABELS[job.status]}${suffix}`;
    });
    return ['Последние задачи:', ...lines].join('\n');
  }

  async describeBalance(userId: string): Promise<string> {
    const { balance, hold, available } = await this.billing.getBalance(userId);
    const frozen = hold > 0 ? `\nЗаморожено под задачи: ${hold}` : '';
    return `Ваш баланс: ${balance} токенов\nДоступно: ${available}${frozen}\nСтоимость генерации: ${this.defaultPrice}`;
  }

  // в личном чате id чата совпадает с id пользователя
  private senderId(ctx: Context): string {
    return String(ctx.from?.id ?? ctx.chat?.id ?? '');
  }

  private registerHandlers() {
    this.bot.command('generate', async (ctx) => {
      const prompt = ctx.payload.trim();
      const reply = await this.startGeneration(this.senderId(ctx), String(ctx.chat.id), prompt, ctx.message.message_id);
      await ctx.reply(reply);
    });

    this.bot.command('jobs', async (ctx) => {
      await ctx.reply(await this.describeJobs(this.senderId(ctx)));
    });

    this.bot.command('balance', async (ctx) => {
      await ctx.reply(await this.describeBalance(this.senderId(ctx)));
    });

    this.bot.catch((err, ctx) => {
      this.logger.error('TG error', describeError(err));
      this.logger.debug('Update caused error', JSON.stringify(ctx.update, null, 2));
    });
  }
}
