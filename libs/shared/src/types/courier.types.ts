import { GeoPoint } from './order.types';

export interface CourierProfile {
  id: string;
  name: string;
  position: GeoPoint;
  onDuty: boolean;
  activeOrderCount: number;
  capacity: number;
}

export type ReservationResult = { ok: true } | { ok: false; reason: 'FULL' | 'NOT_FOUND' };

export function isCourierAvailable(courier: Pick<CourierProfile, 'onDuty' | 'activeOrderCount' | 'capacity'>): boolean {
  return courier.onDuty && courier.activeOrderCount < courier.capacity;
}
