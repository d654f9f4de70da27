import { GeoPoint, ReservationResult } from '@marketplace/shared';
import { Courier } from '../entities/courier.entity';

export const COURIER_STORE = Symbol('COURIER_STORE');

/** Profile fields a registration may change. The active-order count is never among them. */
export interface CourierProfileChange {
  id: string;
  name: string;
  position: GeoPoint;
  capacity: number;
  /** Kept as stored when omitted; new couriers start on duty. */
  onDuty?: boolean;
}

export type ProfileWriteResult =
  | { status: 'CREATED' | 'UPDATED'; courier: Courier }
  | { status: 'OVER_CAPACITY'; activeOrderCount: number };

export interface CourierStore {
  findById(courierId: string): Promise<Courier | null>;
  findOnDuty(): Promise<Courier[]>;
  /**
   * Creates the courier or updates its profile in place. An update only applies while
   * `activeOrderCount <= capacity` holds for the new capacity.
   */
  writeProfile(change: CourierProfileChange): Promise<ProfileWriteResult>;
  setOnDuty(courierId: string, onDuty: boolean): Promise<Courier | null>;
  updatePosition(courierId: string, position: GeoPoint): Promise<Courier | null>;
  /** Atomic `onDuty && activeOrderCount < capacity` check and increment. */
  tryReserve(courierId: string): Promise<ReservationResult>;
  /** Decrements the active-order count, never below zero. False when the courier is unknown. */
  release(courierId: string): Promise<boolean>;
}
