import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { randomUUID } from 'crypto';
import { hostname } from 'os';
import { LessThan, Repository } from 'typeorm';
import { ServiceLease } from '../entities/service-lease.entity';
import { describeError } from '../../common/errors';

// Аренда, владелец которой выполняет сверку и обрабатывает callback-и
export const RECONCILER_LEASE = 'reconciler';

/**
 * Выбор активного экземпляра через строку аренды в базе.
 * Захватить аренду можно, только если её нет или срок истёк.
 */
@Injectable()
export class LeaseService {
  private readonly logger = new Logger(LeaseService.name);
  readonly instanceId: string;
  private active = false;

  constructor(
    @InjectRepository(ServiceLease)
    private readonly leaseRepo: Repository<ServiceLease>,
    private readonly cfg: ConfigService,
  ) {
    this.instanceId = this.cfg.get<string>('INSTANCE_ID')?.trim() || `${hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;
  }

  isActive(): boolean {
    return this.active;
  }

  /** Продлевает свою аренду, перехватывает истёкшую или создаёт новую */
  async acquire(name: string, ttlMs: number, now = new Date()): Promise<boolean> {
    const expiresAt = new Date(now.getTime() + ttlMs);
    try {
      const renewed = await this.leaseRepo.update({ name, holder: this.instanceId }, { expiresAt });
      if (renewed.affected) return this.setActive(true);

      const taken = await this.leaseRepo.update(
        { name, expiresAt: LessThan(now) },
        { holder: this.instanceId, expiresAt },
      );
      if (taken.affected) {
        this.logger.warn(`Аренда ${name} истекла и перехвачена экземпляром ${this.instanceId}`);
        return this.setActive(true);
      }

      if (await this.leaseRepo.findOne({ where: { name } })) {
        return this.setActive(false);
      }

      await this.leaseRepo.insert({ name, holder: this.instanceId, expiresAt });
      return this.setActive(true);
    } catch (error) {
      // например, другой экземпляр создал аренду одновременно с нами
      this.logger.warn(`Не удалось получить аренду ${name}: ${describeError(error)}`);
      return this.setActive(false);
    }
  }

  async release(name: string): Promise<void> {
    await this.leaseRepo.delete({ name, holder: this.instanceId });
    this.setActive(false);
  }

  private setActive(value: boolean): boolean {
    if (value !== this.active) {
      this.logger.log(value ? `Экземпляр ${this.instanceId} стал активным` : `Экземпляр ${this.instanceId} перешёл в пассивный режим`);
    }
    this.active = value;
    return value;
  }
}
