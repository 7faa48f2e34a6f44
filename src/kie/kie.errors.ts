export type KieErrorCode =
  | 'unauthorized'
  | 'payment_required'
  | 'validation_error'
  | 'rate_limited'
  | 'server_error'
  | 'network_error'
  | 'unknown_error';

// Синхронная ошибка обращения к API провайдера
export class KieApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: KieErrorCode,
    readonly userMessage: string,
  ) {
    super(message);
    this.name = 'KieApiError';
  }
}

export function classifyKieError(status: number, message: string): KieApiError {
  if (status === 0) {
    return new KieApiError(message, status, 'network_error', 'Сервис генерации недоступен. Попробуйте ещё раз позже.');
  }
  if (status === 401) {
    return new KieApiError(message, status, 'unauthorized', 'Сервис генерации временно недоступен.');
  }
  if (status === 402) {
    return new KieApiError(message, status, 'payment_required', 'Сервис генерации временно недоступен.');
  }
  if (status === 422 || status === 400) {
    return new KieApiError(message, status, 'validation_error', 'Некорректные параметры запроса. Проверьте введённые данные.');
  }
  if (status === 429) {
    return new KieApiError(message, status, 'rate_limited', 'Слишком много запросов. Попробуйте чуть позже.');
  }
  if (status >= 500 && status < 600) {
    return new KieApiError(message, status, 'server_error', 'Сервис генерации временно недоступен. Попробуйте ещё раз позже.');
  }
  return new KieApiError(message, status, 'unknown_error', 'Ошибка при обращении к сервису генерации. Попробуйте ещё раз.');
}
