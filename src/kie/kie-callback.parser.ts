import { JsonRecord, isRecord, parseJson, pickString } from '../common/json';

// Нормализованные состояния задачи у провайдера
export type CallbackStatus = 'success' | 'fail' | 'running';

export interface KieCallbackOutcome {
  taskId: string;
  status: CallbackStatus;
  resultUrls: string[];
  error: string | null;
  // исходное тело уведомления, сохраняется для разбора инцидентов
  raw: unknown;
}

const SUCCESS_STATES = new Set(['success', 'succeed', 'succeeded', 'completed', 'complete', 'done', 'finished']);
const FAIL_STATES = new Set(['fail', 'failed', 'error', 'timeout', 'expired', 'canceled', 'cancelled']);

export function normalizeKieState(raw: string | undefined): CallbackStatus | undefined {
  if (!raw) return undefined;
  const state = raw.toLowerCase();
  if (SUCCESS_STATES.has(state)) return 'success';
  if (FAIL_STATES.has(state)) return 'fail';
  // waiting, queued, generating и прочие промежуточные состояния
  return 'running';
}

export function isTerminalCallback(status: CallbackStatus): boolean {
  return status !== 'running';
}

function collectUrls(value: unknown, into: string[]) {
  if (typeof value === 'string') {
    if (/^https?:\/\//i.test(value.trim()) && !into.includes(value.trim())) into.push(value.trim());
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      if (isRecord(item)) {
        collectUrls(item.url ?? item.imageUrl ?? item.videoUrl ?? item.audioUrl, into);
      } else {
        collectUrls(item, into);
      }
    }
  }
}

function urlsFrom(source: JsonRecord, into: string[]) {
  collectUrls(source.resultUrls, into);
  collectUrls(source.result_urls, into);
}

/**
 * Извлекает ссылки на результат. Провайдер кладёт их по-разному:
 * data.resultUrls, data.resultJson (строка с JSON или объект), data.response, data.info.
 */
export function extractResultUrls(data: JsonRecord): string[] {
  const urls: string[] = [];
  urlsFrom(data, urls);

  const resultJson = typeof data.resultJson === 'string' ? parseJson(data.resultJson) : data.resultJson;
  if (isRecord(resultJson)) urlsFrom(resultJson, urls);

  for (const key of ['response', 'info']) {
    const nested = data[key];
    if (isRecord(nested)) urlsFrom(nested, urls);
  }
  return urls;
}

/**
 * Разбирает тело callback-а провайдера.
 * Возвращает null, если в теле нет task id: такое уведомление сопоставить не с чем.
 */
export function parseKieCallback(body: unknown): KieCallbackOutcome | null {
  if (!isRecord(body)) return null;
  const data = isRecord(body.data) ? body.data : body;

  const taskId = pickString(data, ['taskId', 'task_id', 'recordId']) ?? pickString(body, ['taskId', 'task_id']);
  if (!taskId) return null;

  const resultUrls = extractResultUrls(data);
  const failCode = data.failCode ?? data.fail_code ?? data.errorCode;
  const hasFailCode = failCode !== undefined && failCode !== null && failCode !== '';

  let status = normalizeKieState(pickString(data, ['state', 'status', 'taskStatus']));
  if (hasFailCode) {
    status = 'fail';
  } else if (!status) {
    if (typeof body.code === 'number' && body.code !== 200) status = 'fail';
    else status = resultUrls.length > 0 ? 'success' : 'running';
  }

  let error: string | null = null;
  if (status === 'fail') {
    error =
      pickString(data, ['failMsg', 'errorMessage', 'error']) ??
      pickString(body, ['msg']) ??
      (hasFailCode ? `Код ошибки: ${String(failCode)}` : 'Неизвестная ошибка');
  } else if (status === 'success' && resultUrls.length === 0) {
    // выполненная задача без ссылок не может быть доставлена
    status = 'fail';
    error = 'Провайдер не вернул ссылки на результат';
  }

  return {
    taskId,
    status,
    resultUrls: status === 'success' ? resultUrls : [],
    error,
    raw: body,
  };
}
