import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fetch, { Response } from 'node-fetch';
import { readNumber } from '../../common/config';
import { describeError } from '../../common/errors';
import { isRecord, parseJson, pickString } from '../../common/json';
import { classifyKieError } from '../kie.errors';

/**
 * Клиент API генерации. Создаёт задачу и сообщает провайдеру адрес,
 * на который тот пришлёт результат. Повторов здесь нет: задача,
 * созданная дважды, будет оплачена дважды.
 */
@Injectable()
export class KieService {
  private readonly logger = new Logger(KieService.name);
  private readonly apiUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly callbackUrl?: string;

  constructor(private readonly cfg: ConfigService) {
    this.apiUrl = (this.cfg.get<string>('KIE_API_URL') || 'https://api.kie.ai').replace(/\/+$/, '');
    this.apiKey = this.cfg.get<string>('KIE_API_KEY')?.trim() || undefined;
    this.timeoutMs = readNumber(this.cfg, 'KIE_TIMEOUT_MS', 30_000);
    this.callbackUrl = this.cfg.get<string>('KIE_CALLBACK_URL')?.trim() || undefined;

    if (!this.apiKey) {
      this.logger.warn('KIE_API_KEY не задан в переменных окружения');
    }
    if (!this.callbackUrl) {
      this.logger.warn('KIE_CALLBACK_URL не задан: результаты будут приходить только через сверку');
    }
  }

  /**
   * Создаёт задачу генерации и возвращает её task id.
   * @throws KieApiError при сетевой ошибке, отказе API или ответе без taskId
   */
  async createTask(model: string, input: Record<string, unknown>): Promise<string> {
    if (!this.apiKey) {
      throw classifyKieError(401, 'KIE_API_KEY не задан');
    }

    const body: Record<string, unknown> = { model, input };
    if (this.callbackUrl) body.callBackUrl = this.callbackUrl;

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}/api/v1/jobs/createTask`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(body),
        timeout: this.timeoutMs,
      });
    } catch (error) {
      this.logger.error(`Сетевая ошибка при создании задачи (${model}): ${describeError(error)}`);
      throw classifyKieError(0, describeError(error));
    }

    const text = await response.text();
    const data = parseJson(text);
    this.logger.debug(`Ответ createTask: ${response.status} ${text.slice(0, 500)}`);

    if (!response.ok) {
      const message = (isRecord(data) && pickString(data, ['msg', 'message'])) || text || `HTTP ${response.status}`;
      this.logger.error(`Ошибка API генерации: ${response.status} - ${message}`);
      throw classifyKieError(response.status, message);
    }

    if (!isRecord(data) || data.code !== 200) {
      const message = (isRecord(data) && pickString(data, ['msg'])) || 'Неожиданный ответ API';
      const status = isRecord(data) && typeof data.code === 'number' ? data.code : 422;
      this.logger.error(`API генерации отклонил задачу: ${status} - ${message}`);
      throw classifyKieError(status, message);
    }

    const taskId = isRecord(data.data) ? pickString(data.data, ['taskId', 'task_id']) : undefined;
    if (!taskId) {
      this.logger.error('Отсутствует ID задачи в ответе API генерации');
      throw classifyKieError(422, 'В ответе нет taskId');
    }

    this.logger.log(`Задача у провайдера создана, task=${taskId}, модель ${model}`);
    return taskId;
  }
}

