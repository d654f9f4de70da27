import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { GeoPoint, ReservationResult } from '@marketplace/shared';
import { Courier } from '../entities/courier.entity';
import { CourierProfileChange, CourierStore, ProfileWriteResult } from './courier.store';

@Injectable()
export class TypeOrmCourierStore implements CourierStore {
  constructor(@InjectRepository(Courier) private readonly courierRepo: Repository<Courier>) {}

  findById(courierId: string): Promise<Courier | null> {
    return this.courierRepo.findOne({ where: { id: courierId } });
  }

  findOnDuty(): Promise<Courier[]> {
    return this.courierRepo.find({ where: { onDuty: true } });
  }

  async writeProfile(change: CourierProfileChange): Promise<ProfileWriteResult> {
    const updated = await this.courierRepo
      .createQueryBuilder()
      .update(Courier)
      .set({
        name: change.name,
        position: change.position,
        capacity: change.capacity,
        ...(change.onDuty === undefined ? {} : { onDuty: change.onDuty }),
      })
      .where('id = :id', { id: change.id })
      .andWhere('active_order_count <= :capacity', { capacity: change.capacity })
      .execute();
    if (updated.affected === 1) {
      return this.written(change.id, 'UPDATED');
    }

    const existing = await this.findById(change.id);
    if (existing) {
      return { status: 'OVER_CAPACITY', activeOrderCount: existing.activeOrderCount };
    }

    await this.courierRepo.insert({
      id: change.id,
      name: change.name,
      position: change.position,
      capacity: change.capacity,
      onDuty: change.onDuty ?? true,
      activeOrderCount: 0,
    });
    return this.written(change.id, 'CREATED');
  }

  async setOnDuty(courierId: string, onDuty: boolean): Promise<Courier | null> {
    const result = await this.courierRepo.update({ id: courierId }, { onDuty });
    return result.affected ? this.findById(courierId) : null;
  }

  async updatePosition(courierId: string, position: GeoPoint): Promise<Courier | null> {
    const result = await this.courierRepo.update({ id: courierId }, { position });
    return result.affected ? this.findById(courierId) : null;
  }

  async tryReserve(courierId: string): Promise<ReservationResult> {
    const result = await this.courierRepo
      .createQueryBuilder()
      .update(Courier)
      .set({ activeOrderCount: () => 'active_order_count + 1' })
      .where('id = :id', { id: courierId })
      .andWhere('on_duty = true')
      .andWhere('active_order_count < capacity')
      .execute();

    if (result.affected === 1) {
      return { ok: true };
    }
    const known = await this.courierRepo.count({ where: { id: courierId } });
    return { ok: false, reason: known > 0 ? 'FULL' : 'NOT_FOUND' };
  }

  async release(courierId: string): Promise<boolean> {
    const result = await this.courierRepo
      .createQueryBuilder()
      .update(Courier)
      .set({ activeOrderCount: () => 'GREATEST(active_order_count - 1, 0)' })
      .where('id = :id', { id: courierId })
      .execute();
    return result.affected === 1;
  }

  private async written(courierId: string, status: 'CREATED' | 'UPDATED'): Promise<ProfileWriteResult> {
    const courier = await this.findById(courierId);
    if (!courier) {
      throw new Error(`Courier ${courierId} is missing right after it was written`);
    }
    return { status, courier };
  }
}
