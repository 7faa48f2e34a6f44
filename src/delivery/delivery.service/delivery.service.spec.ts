import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { getBotToken } from 'nestjs-telegraf';
import { DeliveryService } from './delivery.service';
import { JobsService } from '../../jobs/jobs.service/jobs.service';
import { GenerationJob } from '../../jobs/entities/generation-job.entity';
import { JobStatus } from '../../jobs/constants/job-status.enum';
import { testConfig, testDatabase } from '../../testing/test-database';
import { BotStub, createBotStub } from '../../testing/bot-stub';

describe('DeliveryService', () => {
  let module: TestingModule;
  let service: DeliveryService;
  let jobs: JobsService;
  let bot: BotStub;

  const doneJob = async (urls: string[]) => {
    const job = await jobs.create({ userId: '1001', chatId: '2001', model: 'm', input: {} });
    await jobs.transition(job.id, JobStatus.DONE, { resultUrls: urls });
    const done = await jobs.findById(job.id);
    if (!done) throw new Error('job not found');
    return done;
  };

  beforeEach(async () => {
    bot = createBotStub();
    module = await Test.createTestingModule({
      imports: [testDatabase(), TypeOrmModule.forFeature([GenerationJob])],
      providers: [
        DeliveryService,
        JobsService,
        { provide: getBotToken(), useValue: bot },
        { provide: ConfigService, useValue: testConfig({ DELIVERY_CLAIM_TTL_MS: 60_000 }) },
      ],
    }).compile();
    service = module.get(DeliveryService);
    jobs = module.get(JobsService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('sends each result by media type and marks the job delivered', async () => {
    const job = await doneJob(['https://cdn.test/a.png', 'https://cdn.test/b.mp4']);

    expect(await service.deliver(job)).toBe(true);

    expect(bot.telegram.sendPhoto).toHaveBeenCalledWith('2001', 'https://cdn.test/a.png', {
      caption: `Генерация готова\nID: ${job.id}`,
    });
    expect(bot.telegram.sendVideo).toHaveBeenCalledWith('2001', 'https://cdn.test/b.mp4', undefined);
    const stored = await jobs.findById(job.id);
    expect(stored?.delivered).toBe(true);
    expect(stored?.deliveredAt).toBeInstanceOf(Date);
  });

  it('falls back to a text message with links when media cannot be sent', async () => {
    bot.telegram.sendPhoto.mockRejectedValueOnce(new Error('wrong file identifier'));
    const job = await doneJob(['https://cdn.test/a.png']);

    expect(await service.deliver(job)).toBe(true);

    expect(bot.telegram.sendMessage).toHaveBeenCalledWith(
      '2001',
      `Генерация готова\nID: ${job.id}\n\nhttps://cdn.test/a.png`,
    );
  });

  it('sends only the links that are left when a media item fails', async () => {
    bot.telegram.sendVideo.mockRejectedValueOnce(new Error('failed to get HTTP URL content'));
    const job = await doneJob(['https://cdn.test/a.png', 'https://cdn.test/b.mp4', 'https://cdn.test/c.mp3']);

    expect(await service.deliver(job)).toBe(true);

    expect(bot.telegram.sendPhoto).toHaveBeenCalledTimes(1);
    expect(bot.telegram.sendAudio).not.toHaveBeenCalled();
    expect(bot.telegram.sendMessage).toHaveBeenCalledWith(
      '2001',
      `Остальные результаты\nID: ${job.id}\n\nhttps://cdn.test/b.mp4\nhttps://cdn.test/c.mp3`,
    );
  });

  it('resumes a failed delivery after the items already sent', async () => {
    bot.telegram.sendVideo.mockRejectedValueOnce(new Error('failed to get HTTP URL content'));
    bot.telegram.sendMessage.mockRejectedValueOnce(new Error('Too Many Requests'));
    const job = await doneJob(['https://cdn.test/a.png', 'https://cdn.test/b.mp4', 'https://cdn.test/c.mp3']);

    expect(await service.deliver(job)).toBe(false);
    const failed = await jobs.findById(job.id);
    if (!failed) throw new Error('job not found');
    expect(failed.sentCount).toBe(1);
    expect(failed.deliveryAttempts).toBe(1);
    expect(failed.deliveryClaimedUntil).toBeNull();

    expect(await service.deliver(failed)).toBe(true);

    expect(bot.telegram.sendPhoto).toHaveBeenCalledTimes(1);
    expect(bot.telegram.sendVideo).toHaveBeenLastCalledWith('2001', 'https://cdn.test/b.mp4', {
      caption: `Генерация готова\nID: ${job.id}`,
    });
    expect(bot.telegram.sendAudio).toHaveBeenCalledWith('2001', 'https://cdn.test/c.mp3', undefined);
    expect((await jobs.findById(job.id))?.delivered).toBe(true);
  });

  it('sends once when two deliveries of the same job start together', async () => {
    const job = await doneJob(['https://cdn.test/a.png']);

    const results = await Promise.all([service.deliver(job), service.deliver(job)]);

    expect(results.filter((sent) => sent)).toHaveLength(1);
    expect(bot.telegram.sendPhoto).toHaveBeenCalledTimes(1);
  });

  it('skips a job claimed by another sender until the claim expires', async () => {
    const job = await doneJob(['https://cdn.test/a.png']);
    await jobs.claimDelivery(job.id, 60_000);

    expect(await service.deliver(job)).toBe(false);
    expect(bot.telegram.sendPhoto).not.toHaveBeenCalled();

    await jobs.claimDelivery(job.id, 60_000, new Date(Date.now() - 120_000));
    expect(await service.deliver(job)).toBe(false);

    const other = await doneJob(['https://cdn.test/b.png']);
    await jobs.claimDelivery(other.id, 60_000, new Date(Date.now() - 120_000));
    expect(await service.deliver(other)).toBe(true);
  });

  it('records a failed attempt and leaves the job undelivered', async () => {
    bot.telegram.sendDocument.mockRejectedValue(new Error('chat not found'));
    bot.telegram.sendMessage.mockRejectedValue(new Error('chat not found'));
    const job = await doneJob(['https://cdn.test/archive.zip']);

    expect(await service.deliver(job)).toBe(false);

    const stored = await jobs.findById(job.id);
    expect(stored?.delivered).toBe(false);
    expect(stored?.deliveryAttempts).toBe(1);
    expect(stored?.lastDeliveryError).toBe('chat not found');
  });

  it('does not send a job that is not done or already delivered', async () => {
    const pending = await jobs.create({ userId: '1001', chatId: '2001', model: 'm', input: {} });
    expect(await service.deliver(pending)).toBe(false);

    const job = await doneJob(['https://cdn.test/a.png']);
    await jobs.markDelivered(job.id);
    const delivered = await jobs.findById(job.id);
    if (!delivered) throw new Error('job not found');
    expect(await service.deliver(delivered)).toBe(false);

    expect(bot.telegram.sendPhoto).not.toHaveBeenCalled();
  });

  it('notifies the user about a failed job', async () => {
    const job = await jobs.create({ userId: '1001', chatId: '2001', model: 'm', input: {} });
    await jobs.transition(job.id, JobStatus.FAILED, { errorText: 'Content policy violation' });

    expect(await service.notifyFailure({ ...job, status: JobStatus.FAILED, errorText: 'Content policy violation' })).toBe(
      true,
    );
    expect(bot.telegram.sendMessage).toHaveBeenCalledWith(
      '2001',
      `Не удалось выполнить генерацию: Content policy violation\nID: ${job.id}`,
    );
  });

  it('reports a failure notice that could not be sent', async () => {
    bot.telegram.sendMessage.mockRejectedValue(new Error('bot was blocked by the user'));
    const job = await jobs.create({ userId: '1001', chatId: '2001', model: 'm', input: {} });

    expect(await service.notifyFailure(job)).toBe(false);
  });
});
