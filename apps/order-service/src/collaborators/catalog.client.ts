import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom, timeout } from 'rxjs';
import { GeoPoint, describeError } from '@marketplace/shared';
import { CircuitBreakerService } from '../common/services/circuit-breaker.service';
import { EngineErrors, ErrorCode } from '../common/errors/engine.exception';
import { answerNullOn } from './http-status';

export const CATALOG_CLIENT = Symbol('CATALOG_CLIENT');

export interface CatalogDish {
  dishId: string;
  name: string;
  unitPrice: number;
  restaurantId: string;
  active: boolean;
}

export interface CatalogRestaurant {
  id: string;
  location: GeoPoint;
  active: boolean;
}

/**
 * Point-in-time price source. Whatever it returns is copied into the order, so later
 * catalog changes never touch existing orders.
 */
export interface CatalogClient {
  getDishes(dishIds: string[]): Promise<CatalogDish[]>;
  getRestaurant(restaurantId: string): Promise<CatalogRestaurant | null>;
}

interface DishesResponse {
  dishes: CatalogDish[];
}

@Injectable()
export class HttpCatalogClient implements CatalogClient {
  private readonly logger = new Logger(HttpCatalogClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
    private readonly circuitBreaker: CircuitBreakerService,
  ) {
    this.baseUrl = this.configService.get<string>('CATALOG_SERVICE_URL', 'http://localhost:3100');
    this.timeoutMs = Number(this.configService.get('COLLABORATOR_TIMEOUT_MS', 2000));
  }

  async getDishes(dishIds: string[]): Promise<CatalogDish[]> {
    try {
      const response = await this.circuitBreaker.execute('catalog', () =>
        firstValueFrom(
          this.httpService
            .get<DishesResponse>(`${this.baseUrl}/dishes`, {
              params: { ids: dishIds.join(',') },
              timeout: this.timeoutMs,
            })
            .pipe(timeout(this.timeoutMs + 50)),
        ),
      );
      return response.data.dishes;
    } catch (error) {
      this.logger.error('Catalog dish lookup failed', { dishIds, error: describeError(error) });
      throw EngineErrors.dependencyFailure(ErrorCode.CATALOG_UNAVAILABLE, 'Catalog service is unavailable, retry later');
    }
  }

  async getRestaurant(restaurantId: string): Promise<CatalogRestaurant | null> {
    try {
      const response = await this.circuitBreaker.execute('catalog', () =>
        firstValueFrom(
          this.httpService
            .get<CatalogRestaurant>(`${this.baseUrl}/restaurants/${encodeURIComponent(restaurantId)}`, {
              timeout: this.timeoutMs,
            })
            .pipe(timeout(this.timeoutMs + 50), answerNullOn(404)),
        ),
      );
      return response ? response.data : null;
    } catch (error) {
      this.logger.error('Catalog restaurant lookup failed', { restaurantId, error: describeError(error) });
      throw EngineErrors.dependencyFailure(ErrorCode.CATALOG_UNAVAILABLE, 'Catalog service is unavailable, retry later');
    }
  }
}
