import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { JobsService } from './jobs.service';
import { GenerationJob } from '../entities/generation-job.entity';
import { JobStatus } from '../constants/job-status.enum';
import { InvalidJobStateError } from '../../common/errors';
import { testDatabase } from '../../testing/test-database';

describe('JobsService', () => {
  let module: TestingModule;
  let service: JobsService;

  const newJob = (overrides: Partial<{ userId: string; idempotencyKey: string }> = {}) =>
    service.create({
      userId: overrides.userId ?? '1001',
      chatId: '2001',
      model: 'test-model',
      input: { prompt: 'кот' },
      price: 10,
      idempotencyKey: overrides.idempotencyKey,
    });

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [testDatabase(), TypeOrmModule.forFeature([GenerationJob])],
      providers: [JobsService],
    }).compile();
    service = module.get(JobsService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('creates a pending undelivered job without task id', async () => {
    const job = await newJob();
    const stored = await service.findById(job.id);

    expect(stored).toMatchObject({
      status: JobStatus.PENDING,
      taskId: null,
      delivered: false,
      resultUrls: [],
      input: { prompt: 'кот' },
      price: 10,
      deliveryAttempts: 0,
    });
  });

  it('finds a job by task id after it is attached', async () => {
    const job = await newJob();
    await service.attachTaskId(job.id, 'task-1');

    const found = await service.findByTaskId('task-1');
    expect(found?.id).toBe(job.id);
    expect(await service.findByTaskId('task-2')).toBeNull();
  });

  it('finds a job by idempotency key', async () => {
    const job = await newJob({ idempotencyKey: 'tg:1:1' });
    expect((await service.findByIdempotencyKey('tg:1:1'))?.id).toBe(job.id);
  });

  it('moves pending to done with result urls and sets finishedAt', async () => {
    const job = await newJob();

    expect(await service.transition(job.id, JobStatus.DONE, { resultUrls: ['https://cdn.test/a.png'] })).toBe(true);

    const stored = await service.findById(job.id);
    expect(stored?.status).toBe(JobStatus.DONE);
    expect(stored?.resultUrls).toEqual(['https://cdn.test/a.png']);
    expect(stored?.finishedAt).toBeInstanceOf(Date);
  });

  it('never leaves a terminal status', async () => {
    const job = await newJob();
    await service.transition(job.id, JobStatus.FAILED, { errorText: 'boom' });

    expect(await service.transition(job.id, JobStatus.DONE, { resultUrls: ['https://cdn.test/a.png'] })).toBe(false);
    expect(await service.transition(job.id, JobStatus.RUNNING)).toBe(false);

    const stored = await service.findById(job.id);
    expect(stored?.status).toBe(JobStatus.FAILED);
    expect(stored?.errorText).toBe('boom');
    expect(stored?.resultUrls).toEqual([]);
  });

  it('lets only one of two concurrent transitions win', async () => {
    const job = await newJob();

    const results = await Promise.all([
      service.transition(job.id, JobStatus.DONE, { resultUrls: ['https://cdn.test/a.png'] }),
      service.transition(job.id, JobStatus.DONE, { resultUrls: ['https://cdn.test/b.png'] }),
    ]);

    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it('rejects done without urls and urls without done', async () => {
    const job = await newJob();

    await expect(service.transition(job.id, JobStatus.DONE)).rejects.toBeInstanceOf(InvalidJobStateError);
    await expect(
      service.transition(job.id, JobStatus.FAILED, { resultUrls: ['https://cdn.test/a.png'] }),
    ).rejects.toBeInstanceOf(InvalidJobStateError);
    await expect(service.transition(job.id, JobStatus.PENDING)).rejects.toBeInstanceOf(InvalidJobStateError);
  });

  it('refuses to mark a job delivered unless it is done', async () => {
    const job = await newJob();

    await expect(service.updateJobStatus(job.id, JobStatus.RUNNING, undefined, true)).rejects.toBeInstanceOf(
      InvalidJobStateError,
    );
    expect(await service.markDelivered(job.id)).toBe(false);
    expect((await service.findById(job.id))?.delivered).toBe(false);
  });

  it('updates status and delivered flag together', async () => {
    const job = await newJob();

    expect(await service.updateJobStatus(job.id, JobStatus.DONE, ['https://cdn.test/a.png'], true)).toBe(true);

    const stored = await service.findById(job.id);
    expect(stored?.status).toBe(JobStatus.DONE);
    expect(stored?.delivered).toBe(true);
    expect(stored?.deliveredAt).toBeInstanceOf(Date);
    expect(await service.updateJobStatus('missing', JobStatus.DONE, ['https://cdn.test/a.png'])).toBe(false);
  });

  it('marks a job delivered only once', async () => {
    const job = await newJob();
    await service.transition(job.id, JobStatus.DONE, { resultUrls: ['https://cdn.test/a.png'] });

    expect(await service.markDelivered(job.id)).toBe(true);
    expect(await service.markDelivered(job.id)).toBe(false);
  });

  it('lets one caller claim a delivery until the claim expires', async () => {
    const job = await newJob();
    const now = new Date();
    expect(await service.claimDelivery(job.id, 60_000, now)).toBe(false);

    await service.transition(job.id, JobStatus.DONE, { resultUrls: ['https://cdn.test/a.png', 'https://cdn.test/b.png'] });
    expect(await service.claimDelivery(job.id, 60_000, now)).toBe(true);
    expect(await service.claimDelivery(job.id, 60_000, now)).toBe(false);
    expect(await service.claimDelivery(job.id, 60_000, new Date(now.getTime() + 61_000))).toBe(true);

    await service.recordDeliveryFailure(job.id, 'timeout', 1);
    const failed = await service.findById(job.id);
    expect(failed?.deliveryClaimedUntil).toBeNull();
    expect(failed?.sentCount).toBe(1);
    expect(await service.claimDelivery(job.id, 60_000, now)).toBe(true);

    expect(await service.markDelivered(job.id)).toBe(true);
    expect(await service.claimDelivery(job.id, 60_000, new Date(now.getTime() + 600_000))).toBe(false);
  });

  it('lists done undelivered jobs below the attempt limit', async () => {
    const fresh = await newJob();
    const exhausted = await newJob();
    const delivered = await newJob();
    const pending = await newJob();
    for (const job of [fresh, exhausted, delivered]) {
      await service.transition(job.id, JobStatus.DONE, { resultUrls: ['https://cdn.test/a.png'] });
    }
    await service.markDelivered(delivered.id);
    await service.recordDeliveryFailure(exhausted.id, 'chat not found');
    await service.recordDeliveryFailure(exhausted.id, 'chat not found');

    const all = await service.getUndeliveredJobs(10);
    expect(all.map((j) => j.id).sort()).toEqual([fresh.id, exhausted.id].sort());

    const limited = await service.getUndeliveredJobs(10, 2);
    expect(limited.map((j) => j.id)).toEqual([fresh.id]);
    expect(all.some((j) => j.id === pending.id)).toBe(false);

    const stored = await service.findById(exhausted.id);
    expect(stored?.deliveryAttempts).toBe(2);
    expect(stored?.lastDeliveryError).toBe('chat not found');
  });

  it('finds active jobs created before the cutoff', async () => {
    const active = await newJob();
    const finished = await newJob();
    await service.transition(finished.id, JobStatus.FAILED, { errorText: 'x' });

    const future = new Date(Date.now() + 60_000);
    expect((await service.findStale(future, 10)).map((j) => j.id)).toEqual([active.id]);
    expect(await service.findStale(new Date(Date.now() - 60_000), 10)).toEqual([]);
  });

  it('lists jobs of one user', async () => {
    await newJob({ userId: '1' });
    await newJob({ userId: '1' });
    await newJob({ userId: '2' });

    expect(await service.listUserJobs('1')).toHaveLength(2);
    expect(await service.listUserJobs('1', 1)).toHaveLength(1);
  });
});
