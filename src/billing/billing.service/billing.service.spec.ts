import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { BillingService } from './billing.service';
import { Wallet } from '../entities/wallet.entity';
import { LedgerEntry } from '../entities/ledger-entry.entity';
import { InsufficientFundsError } from '../../common/errors';
import { testConfig, testDatabase } from '../../testing/test-database';

describe('BillingService', () => {
  let module: TestingModule;
  let service: BillingService;
  let ledger: Repository<LedgerEntry>;

  const job = { id: 'job-1', userId: '1001', price: 30 };

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [testDatabase(), TypeOrmModule.forFeature([Wallet, LedgerEntry])],
      providers: [BillingService, { provide: ConfigService, useValue: testConfig({ INITIAL_BALANCE: 100 }) }],
    }).compile();
    service = module.get(BillingService);
    ledger = module.get(getRepositoryToken(LedgerEntry));
  });

  afterEach(async () => {
    await module.close();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('reports the starting balance for a new user', async () => {
    expect(await service.getBalance('new')).toEqual({ balance: 100, hold: 0, available: 100 });
  });

  it('holds and then captures the job price', async () => {
    expect(await service.holdForJob(job)).toBe(true);
    expect(await service.getBalance('1001')).toEqual({ balance: 100, hold: 30, available: 70 });

    expect(await service.captureForJob(job)).toBe(true);
    expect(await service.getBalance('1001')).toEqual({ balance: 70, hold: 0, available: 70 });

    const kinds = (await ledger.find({ where: { userId: '1001' }, order: { id: 'ASC' } })).map((e) => e.kind);
    expect(kinds).toEqual(['topup', 'hold', 'charge']);
  });

  it('releases the hold without charging', async () => {
    await service.holdForJob(job);

    expect(await service.releaseForJob(job)).toBe(true);
    expect(await service.getBalance('1001')).toEqual({ balance: 100, hold: 0, available: 100 });
  });

  it('applies each job operation once', async () => {
    expect(await service.holdForJob(job)).toBe(true);
    expect(await service.holdForJob(job)).toBe(false);
    expect(await service.captureForJob(job)).toBe(true);
    expect(await service.captureForJob(job)).toBe(false);

    expect(await service.getBalance('1001')).toEqual({ balance: 70, hold: 0, available: 70 });
  });

  it('skips capture and release when nothing was held', async () => {
    expect(await service.captureForJob(job)).toBe(false);
    expect(await service.releaseForJob(job)).toBe(false);
    expect(await ledger.count({ where: { userId: '1001' } })).toBe(0);
  });

  it('rejects a hold above the available balance', async () => {
    await service.holdForJob({ ...job, id: 'job-a', price: 80 });

    const error = await service.holdForJob(job).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InsufficientFundsError);
    expect(error).toMatchObject({ required: 30, available: 20 });
    expect(await ledger.findOne({ where: { ref: 'job:job-1:hold' } })).toBeNull();
  });

  it('credits a top-up once per reference', async () => {
    expect(await service.topUp('1001', 50, 'payment:1')).toBe(true);
    expect(await service.topUp('1001', 50, 'payment:1')).toBe(false);

    expect((await service.getBalance('1001')).balance).toBe(150);
  });

  it('ignores non-positive amounts', async () => {
    expect(await service.hold('1001', 0, 'zero')).toBe(false);
    expect(await service.topUp('1001', -5, 'negative')).toBe(false);
  });
});
