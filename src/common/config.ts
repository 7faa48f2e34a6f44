import { ConfigService } from '@nestjs/config';

// Числовой параметр из окружения; пустое или нечисловое значение заменяется значением по умолчанию
export function readNumber(cfg: ConfigService, key: string, fallback: number): number {
  const raw = cfg.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}
