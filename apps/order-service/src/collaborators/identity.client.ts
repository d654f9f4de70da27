import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom, timeout } from 'rxjs';
import { ActorRole, USER_ROLES, describeError } from '@marketplace/shared';
import { CircuitBreakerService } from '../common/services/circuit-breaker.service';
import { EngineErrors, ErrorCode } from '../common/errors/engine.exception';
import { answerNullOn } from './http-status';

export const IDENTITY_CLIENT = Symbol('IDENTITY_CLIENT');

export interface CallerIdentity {
  userId: string;
  role: ActorRole;
}

export interface IdentityClient {
  /** Resolves a bearer token; null when the token is not recognised. */
  resolve(token: string): Promise<CallerIdentity | null>;
}

interface IdentityResponse {
  userId: string;
  role: string;
}

function toUserRole(role: string): ActorRole | null {
  const normalized = role.toUpperCase();
  return USER_ROLES.find((candidate) => candidate === normalized) ?? null;
}

@Injectable()
export class HttpIdentityClient implements IdentityClient {
  private readonly logger = new Logger(HttpIdentityClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
    private readonly circuitBreaker: CircuitBreakerService,
  ) {
    this.baseUrl = this.configService.get<string>('IDENTITY_SERVICE_URL', 'http://localhost:3200');
    this.timeoutMs = Number(this.configService.get('COLLABORATOR_TIMEOUT_MS', 2000));
  }

  async resolve(token: string): Promise<CallerIdentity | null> {
    let payload: IdentityResponse;
    try {
      const response = await this.circuitBreaker.execute('identity', () =>
        firstValueFrom(
          this.httpService
            .get<IdentityResponse>(`${this.baseUrl}/sessions/me`, {
              headers: { Authorization: `Bearer ${token}` },
              timeout: this.timeoutMs,
            })
            .pipe(timeout(this.timeoutMs + 50), answerNullOn(401, 404)),
        ),
      );
      if (!response) {
        return null;
      }
      payload = response.data;
    } catch (error) {
      this.logger.error('Identity lookup failed', { error: describeError(error) });
      throw EngineErrors.dependencyFailure(ErrorCode.IDENTITY_UNAVAILABLE, 'Identity service is unavailable, retry later');
    }

    // DISPATCH is internal and never accepted from the identity service.
    const role = toUserRole(payload.role);
    if (!role) {
      this.logger.warn(`Identity service returned unknown role ${payload.role}`, { userId: payload.userId });
      return null;
    }
    return { userId: payload.userId, role };
  }
}
