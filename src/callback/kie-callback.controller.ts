import { Body, Controller, Headers, HttpCode, Logger, Post } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CallbackService } from './callback.service/callback.service';
import { parseKieCallback } from '../kie/kie-callback.parser';

export interface CallbackAck {
  ok: boolean;
  ignored?: boolean;
  error?: string;
}

// Приём уведомлений провайдера. Ответ всегда 200
@Controller('kie')
export class KieCallbackController {
  private readonly logger = new Logger(KieCallbackController.name);
  private readonly callbackToken?: string;

  constructor(
    private readonly callbacks: CallbackService,
    private readonly cfg: ConfigService,
  ) {
    this.callbackToken = this.cfg.get<string>('KIE_CALLBACK_TOKEN')?.trim() || undefined;
  }

  @Post('callback')
  @HttpCode(200)
  async handle(@Body() body: unknown, @Headers('x-callback-token') token?: string): Promise<CallbackAck> {
    if (this.callbackToken && token !== this.callbackToken) {
      this.logger.warn('Callback с неверным токеном отклонён');
      return { ok: false, error: 'invalid_token' };
    }

    const outcome = parseKieCallback(body);
    if (!outcome) {
      this.logger.warn(`Callback без taskId: ${JSON.stringify(body ?? null).slice(0, 200)}`);
      return { ok: true, ignored: true };
    }

    this.logger.log(`Получен callback task=${outcome.taskId}, статус ${outcome.status}, ссылок ${outcome.resultUrls.length}`);
    await this.callbacks.onCallback(outcome.taskId, outcome.status, outcome);
    return { ok: true };
  }
}
