import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Wallet } from '../entities/wallet.entity';
import { LedgerEntry, LedgerKind } from '../entities/ledger-entry.entity';
import { InsufficientFundsError } from '../../common/errors';
import { readNumber } from '../../common/config';

export interface BalanceSnapshot {
  balance: number;
  hold: number;
  available: number;
}

// Поля задачи, нужные для расчётов
export interface BillableJob {
  id: string;
  userId: string;
  price: number;
}

type WalletChange = (manager: EntityManager) => Promise<void>;

/**
 * Токены пользователя: заморозка при отправке задачи, списание после
 * успешной генерации, возврат при ошибке. Каждая операция пишет одну
 * запись в журнал; повтор с той же ссылкой ничего не меняет.
 */
@Injectable()
export class BillingService {
  private readonly logger = new Logger(BillingService.name);
  // стартовый баланс нового пользователя
  private readonly initialBalance: number;

  constructor(
    @InjectRepository(Wallet)
    private readonly walletRepo: Repository<Wallet>,
    private readonly dataSource: DataSource,
    private readonly cfg: ConfigService,
  ) {
    this.initialBalance = readNumber(this.cfg, 'INITIAL_BALANCE', 100);
  }

  async getBalance(userId: string): Promise<BalanceSnapshot> {
    const wallet = await this.walletRepo.findOne({ where: { userId } });
    const balance = wallet?.balance ?? this.initialBalance;
    const hold = wallet?.hold ?? 0;
    return { balance, hold, available: balance - hold };
  }

  topUp(userId: string, amount: number, ref: string): Promise<boolean> {
    return this.applyEntry('topup', userId, amount, ref, (manager) =>
      this.changeWallet(manager, userId, amount, { balance: () => 'balance + :amount' }),
    );
  }

  /** Замораживает amount токенов. Бросает InsufficientFundsError, если свободных токенов меньше */
  hold(userId: string, amount: number, ref: string): Promise<boolean> {
    return this.applyEntry('hold', userId, amount, ref, async (manager) => {
      const result = await manager
        .createQueryBuilder()
        .update(Wallet)
        .set({ hold: () => 'hold + :amount' })
        .where('user_id = :userId', { userId })
        .andWhere('balance - hold >= :amount', { amount })
        .execute();
      if (!result.affected) {
        const wallet = await manager.findOne(Wallet, { where: { userId } });
        throw new InsufficientFundsError(userId, amount, wallet ? wallet.balance - wallet.hold : 0);
      }
    });
  }

  capture(userId: string, amount: number, ref: string, holdRef?: string): Promise<boolean> {
    return this.applyEntry(
      'charge',
      userId,
      amount,
      ref,
      (manager) =>
        this.changeWallet(manager, userId, amount, {
          balance: () => 'balance - :amount',
          hold: () => 'CASE WHEN hold >= :amount THEN hold - :amount ELSE 0 END',
        }),
      holdRef,
    );
  }

  release(userId: string, amount: number, ref: string, holdRef?: string): Promise<boolean> {
    return this.applyEntry(
      'release',
      userId,
      amount,
      ref,
      (manager) =>
        this.changeWallet(manager, userId, amount, {
          hold: () => 'CASE WHEN hold >= :amount THEN hold - :amount ELSE 0 END',
        }),
      holdRef,
    );
  }

  holdForJob(job: BillableJob): Promise<boolean> {
    return this.hold(job.userId, job.price, this.jobRef(job, 'hold'));
  }

  // Списание и возврат выполняются только при наличии заморозки по этой задаче
  captureForJob(job: BillableJob): Promise<boolean> {
    return this.capture(job.userId, job.price, this.jobRef(job, 'charge'), this.jobRef(job, 'hold'));
  }

  releaseForJob(job: BillableJob): Promise<boolean> {
    return this.release(job.userId, job.price, this.jobRef(job, 'release'), this.jobRef(job, 'hold'));
  }

  private jobRef(job: BillableJob, kind: 'hold' | 'charge' | 'release'): string {
    return `job:${job.id}:${kind}`;
  }

  private async changeWallet(
    manager: EntityManager,
    userId: string,
    amount: number,
    set: Partial<Record<'balance' | 'hold', () => string>>,
  ): Promise<void> {
    await manager
      .createQueryBuilder()
      .update(Wallet)
      .set(set)
      .where('user_id = :userId', { userId })
      .setParameter('amount', amount)
      .execute();
  }

  private async applyEntry(
    kind: LedgerKind,
    userId: string,
    amount: number,
    ref: string,
    change: WalletChange,
    requiredRef?: string,
  ): Promise<boolean> {
    if (amount <= 0) return false;

    const applied = await this.dataSource.transaction(async (manager) => {
      if (await manager.findOne(LedgerEntry, { where: { ref } })) {
        this.logger.debug(`Операция ${ref} уже проведена`);
        return false;
      }
      if (requiredRef && !(await manager.findOne(LedgerEntry, { where: { ref: requiredRef } }))) {
        this.logger.warn(`Операция ${ref} пропущена: нет записи ${requiredRef}`);
        return false;
      }
      await this.ensureWallet(manager, userId);
      await change(manager);
      await manager.insert(LedgerEntry, { userId, kind, amount, ref });
      return true;
    });

    if (applied) {
      this.logger.log(`Пользователь ${userId}: ${kind} ${amount} токенов (${ref})`);
    }
    return applied;
  }

  private async ensureWallet(manager: EntityManager, userId: string): Promise<void> {
    if (await manager.findOne(Wallet, { where: { userId } })) return;

    await manager.insert(Wallet, { userId, balance: this.initialBalance, hold: 0 });
    if (this.initialBalance > 0) {
      await manager.insert(LedgerEntry, {
        userId,
        kind: 'topup',
        amount: this.initialBalance,
        ref: `wallet:${userId}:initial`,
      });
    }
    this.logger.log(`Создан кошелёк пользователя ${userId}, стартовый баланс ${this.initialBalance}`);
  }
}
