import { Column, Entity, PrimaryColumn } from 'typeorm';

// Аренда роли с ограниченным сроком; владелец продлевает её на каждом цикле
@Entity({ name: 'service_leases' })
export class ServiceLease {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  name!: string;

  @Column({ type: 'varchar', length: 128 })
  holder!: string;

  @Column({ name: 'expires_at', type: Date })
  expiresAt!: Date;
}
