import { Injectable, Logger } from '@nestjs/common';
import { GeoPoint, haversineDistanceKm } from '@marketplace/shared';
import { Courier } from '../entities/courier.entity';
import { CourierDirectoryService } from '../courier/courier-directory.service';

export interface DispatchTarget {
  id: string;
  restaurantLocation: GeoPoint;
}

export interface DispatchOptions {
  /** Couriers never to pick, e.g. the one being replaced. */
  exclude?: readonly string[];
}

export interface RankedCandidate {
  courierId: string;
  distanceKm: number;
  activeOrderCount: number;
}

export type DispatchResult =
  | { status: 'ASSIGNED'; courierId: string; distanceKm: number; attempted: number }
  | { status: 'NO_COURIER_AVAILABLE'; attempted: number };

/**
 * Ranking compares distance first, then load, then id, so two runs over the same
 * directory snapshot always produce the same order.
 */
export function rankCandidates(origin: GeoPoint, couriers: readonly Courier[]): RankedCandidate[] {
  return couriers
    .map((courier) => ({
      courierId: courier.id,
      distanceKm: haversineDistanceKm(origin, courier.position),
      activeOrderCount: courier.activeOrderCount,
    }))
    .sort((a, b) => {
      if (a.distanceKm !== b.distanceKm) {
        return a.distanceKm - b.distanceKm;
      }
      if (a.activeOrderCount !== b.activeOrderCount) {
        return a.activeOrderCount - b.activeOrderCount;
      }
      return a.courierId < b.courierId ? -1 : a.courierId > b.courierId ? 1 : 0;
    });
}

@Injectable()
export class DispatchAssignerService {
  private readonly logger = new Logger(DispatchAssignerService.name);

  constructor(private readonly directory: CourierDirectoryService) {}

  /**
   * Reserves the best-ranked courier that still has room. The ranking is read without
   * any lock and may be stale; a courier filled in the meantime fails its reservation
   * and the next candidate is tried.
   */
  async assign(order: DispatchTarget, options: DispatchOptions = {}): Promise<DispatchResult> {
    const excluded = new Set(options.exclude ?? []);
    const available = await this.directory.listAvailable();
    const candidates = rankCandidates(
      order.restaurantLocation,
      available.filter((courier) => !excluded.has(courier.id)),
    );

    let attempted = 0;
    for (const candidate of candidates) {
      attempted++;
      const reservation = await this.directory.reserve(candidate.courierId);
      if (reservation.ok) {
        this.logger.log(`Reserved courier ${candidate.courierId} for order ${order.id}`, {
          orderId: order.id,
          courierId: candidate.courierId,
          distanceKm: Number(candidate.distanceKm.toFixed(3)),
          attempted,
        });
        return { status: 'ASSIGNED', courierId: candidate.courierId, distanceKm: candidate.distanceKm, attempted };
      }
      this.logger.debug(`Courier ${candidate.courierId} could not be reserved: ${reservation.reason}`, {
        orderId: order.id,
        courierId: candidate.courierId,
      });
    }

    this.logger.warn(`No courier available for order ${order.id}`, {
      orderId: order.id,
      candidates: candidates.length,
    });
    return { status: 'NO_COURIER_AVAILABLE', attempted };
  }
}
