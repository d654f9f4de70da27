import { Inject, Injectable, Logger } from '@nestjs/common';
import { GeoPoint, ReservationResult, validateLatitude, validateLongitude } from '@marketplace/shared';
import { Courier } from '../entities/courier.entity';
import { COURIER_STORE, CourierStore } from '../persistence/courier.store';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { EngineErrors, EngineException, ErrorCode, ErrorKind } from '../common/errors/engine.exception';

export interface RegisterCourierInput {
  id: string;
  name: string;
  position: GeoPoint;
  capacity: number;
  onDuty?: boolean;
}

/**
 * Authoritative availability and load of every courier. One instance per process;
 * capacity checks for a courier are serialised on that courier's id.
 */
@Injectable()
export class CourierDirectoryService {
  private readonly logger = new Logger(CourierDirectoryService.name);
  private readonly locks = new KeyedMutex();

  constructor(@Inject(COURIER_STORE) private readonly store: CourierStore) {}

  async register(input: RegisterCourierInput): Promise<Courier> {
    this.assertPosition(input.position);
    if (!Number.isInteger(input.capacity) || input.capacity < 1) {
      throw new EngineException(ErrorKind.VALIDATION, ErrorCode.INVALID_COURIER, 'Courier capacity must be at least 1', {
        courierId: input.id,
      });
    }

    return this.locks.runExclusive(input.id, async () => {
      const result = await this.store.writeProfile({
        id: input.id,
        name: input.name,
        position: { latitude: input.position.latitude, longitude: input.position.longitude },
        capacity: input.capacity,
        onDuty: input.onDuty,
      });
      if (result.status === 'OVER_CAPACITY') {
        throw new EngineException(
          ErrorKind.VALIDATION,
          ErrorCode.INVALID_COURIER,
          `Courier ${input.id} already carries ${result.activeOrderCount} orders, above the requested capacity`,
          { courierId: input.id, activeOrderCount: result.activeOrderCount, capacity: input.capacity },
        );
      }

      const { courier } = result;
      this.logger.log(`${result.status === 'CREATED' ? 'Registered' : 'Updated'} courier ${courier.id}`, {
        courierId: courier.id,
        capacity: courier.capacity,
        onDuty: courier.onDuty,
      });
      return courier;
    });
  }

  async get(courierId: string): Promise<Courier> {
    const courier = await this.store.findById(courierId);
    if (!courier) {
      throw EngineErrors.courierNotFound(courierId);
    }
    return courier;
  }

  async setAvailability(courierId: string, onDuty: boolean): Promise<Courier> {
    const courier = await this.locks.runExclusive(courierId, () => this.store.setOnDuty(courierId, onDuty));
    if (!courier) {
      throw EngineErrors.courierNotFound(courierId);
    }
    this.logger.log(`Courier ${courierId} is now ${onDuty ? 'on duty' : 'off duty'}`, { courierId });
    return courier;
  }

  async updateLocation(courierId: string, position: GeoPoint): Promise<Courier> {
    this.assertPosition(position);
    const courier = await this.store.updatePosition(courierId, position);
    if (!courier) {
      throw EngineErrors.courierNotFound(courierId);
    }
    return courier;
  }

  /** Couriers that can take another order right now. May be stale by the time it is used. */
  async listAvailable(): Promise<Courier[]> {
    const onDuty = await this.store.findOnDuty();
    return onDuty.filter((courier) => courier.onDuty && courier.activeOrderCount < courier.capacity);
  }

  reserve(courierId: string): Promise<ReservationResult> {
    return this.locks.runExclusive(courierId, () => this.store.tryReserve(courierId));
  }

  async release(courierId: string): Promise<void> {
    const released = await this.locks.runExclusive(courierId, () => this.store.release(courierId));
    if (!released) {
      this.logger.warn(`Release requested for unknown courier ${courierId}`, { courierId });
    }
  }

  private assertPosition(position: GeoPoint): void {
    if (!validateLatitude(position.latitude) || !validateLongitude(position.longitude)) {
      throw new EngineException(ErrorKind.VALIDATION, ErrorCode.INVALID_COURIER, 'Courier position is out of range', {
        position,
      });
    }
  }
}
