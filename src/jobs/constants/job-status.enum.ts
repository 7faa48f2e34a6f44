// Жизненный цикл задачи генерации: pending → running → done | failed
export enum JobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  DONE = 'done',
  FAILED = 'failed',
}

export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = [JobStatus.PENDING, JobStatus.RUNNING];

export function isTerminalStatus(status: JobStatus): boolean {
  return status === JobStatus.DONE || status === JobStatus.FAILED;
}
