import { Injectable } from '@nestjs/common';
import { LeaseService } from './leadership/lease.service/lease.service';

export interface HealthStatus {
  ok: boolean;
  // владеет ли экземпляр арендой сверки
  active: boolean;
  instanceId: string;
}

@Injectable()
export class AppService {
  constructor(private readonly lease: LeaseService) {}

  getHealth(): HealthStatus {
    return { ok: true, active: this.lease.isActive(), instanceId: this.lease.instanceId };
  }
}
