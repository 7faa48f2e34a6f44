// Ошибки пути отправки задачи. Только они доходят до вызывающего кода,
// остальные компоненты логируют сбои и продолжают работу.

export class SubmissionFailedError extends Error {
  constructor(
    readonly jobId: string,
    message: string,
    // текст, который можно показать пользователю
    readonly userMessage: string,
  ) {
    super(message);
    this.name = 'SubmissionFailedError';
  }
}

export class InsufficientFundsError extends Error {
  constructor(
    readonly userId: string,
    readonly required: number,
    readonly available: number,
  ) {
    super(`Недостаточно токенов: нужно ${required}, доступно ${available}`);
    this.name = 'InsufficientFundsError';
  }
}

export class InvalidJobStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidJobStateError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
