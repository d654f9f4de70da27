import { HttpException, HttpStatus } from '@nestjs/common';
import { ActorRole, CouponRejectionReason, OrderStatus } from '@marketplace/shared';

export enum ErrorKind {
  VALIDATION = 'VALIDATION',
  AUTHORIZATION = 'AUTHORIZATION',
  NOT_FOUND = 'NOT_FOUND',
  STATE_CONFLICT = 'STATE_CONFLICT',
  CONCURRENCY_CONFLICT = 'CONCURRENCY_CONFLICT',
  RESOURCE_UNAVAILABLE = 'RESOURCE_UNAVAILABLE',
  DEPENDENCY_FAILURE = 'DEPENDENCY_FAILURE',
}

export enum ErrorCode {
  INVALID_ITEMS = 'INVALID_ITEMS',
  UNKNOWN_DISH = 'UNKNOWN_DISH',
  UNKNOWN_RESTAURANT = 'UNKNOWN_RESTAURANT',
  DISH_UNAVAILABLE = 'DISH_UNAVAILABLE',
  MIXED_RESTAURANTS = 'MIXED_RESTAURANTS',
  INVALID_COURIER = 'INVALID_COURIER',
  INVALID_COUPON = 'INVALID_COUPON',
  COUPON_EXISTS = 'COUPON_EXISTS',
  UNAUTHENTICATED = 'UNAUTHENTICATED',
  ROLE_NOT_PERMITTED = 'ROLE_NOT_PERMITTED',
  NOT_ASSIGNED_COURIER = 'NOT_ASSIGNED_COURIER',
  ORDER_NOT_FOUND = 'ORDER_NOT_FOUND',
  COURIER_NOT_FOUND = 'COURIER_NOT_FOUND',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  ORDER_CLOSED = 'ORDER_CLOSED',
  CONCURRENT_MODIFICATION = 'CONCURRENT_MODIFICATION',
  NO_COURIER_AVAILABLE = 'NO_COURIER_AVAILABLE',
  CATALOG_UNAVAILABLE = 'CATALOG_UNAVAILABLE',
  IDENTITY_UNAVAILABLE = 'IDENTITY_UNAVAILABLE',
}

export type EngineErrorCode = ErrorCode | CouponRejectionReason;

const STATUS_BY_KIND: Record<ErrorKind, HttpStatus> = {
  [ErrorKind.VALIDATION]: HttpStatus.BAD_REQUEST,
  [ErrorKind.AUTHORIZATION]: HttpStatus.FORBIDDEN,
  [ErrorKind.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ErrorKind.STATE_CONFLICT]: HttpStatus.CONFLICT,
  [ErrorKind.CONCURRENCY_CONFLICT]: HttpStatus.CONFLICT,
  [ErrorKind.RESOURCE_UNAVAILABLE]: HttpStatus.SERVICE_UNAVAILABLE,
  [ErrorKind.DEPENDENCY_FAILURE]: HttpStatus.BAD_GATEWAY,
};

const RETRYABLE_KINDS: readonly ErrorKind[] = [
  ErrorKind.CONCURRENCY_CONFLICT,
  ErrorKind.RESOURCE_UNAVAILABLE,
  ErrorKind.DEPENDENCY_FAILURE,
];

export interface EngineErrorBody {
  kind: ErrorKind;
  code: EngineErrorCode;
  message: string;
  retryable: boolean;
  details: Record<string, unknown>;
}

/**
 * Typed failure raised by every engine operation. Persisted state is left as it
 * was before the call whenever one of these escapes.
 */
export class EngineException extends HttpException {
  readonly retryable: boolean;

  constructor(
    readonly kind: ErrorKind,
    readonly code: EngineErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    const retryable = RETRYABLE_KINDS.includes(kind);
    const body: EngineErrorBody = { kind, code, message, retryable, details };
    super(body, STATUS_BY_KIND[kind]);
    this.retryable = retryable;
  }

  toBody(): EngineErrorBody {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export function isEngineError(error: unknown, code?: EngineErrorCode): error is EngineException {
  return error instanceof EngineException && (code === undefined || error.code === code);
}

export const EngineErrors = {
  invalidItems: (message: string, details: Record<string, unknown> = {}) =>
    new EngineException(ErrorKind.VALIDATION, ErrorCode.INVALID_ITEMS, message, details),

  coupon: (reason: CouponRejectionReason, message: string, code: string) =>
    new EngineException(ErrorKind.VALIDATION, reason, message, { couponCode: code }),

  invalidCoupon: (message: string, code: string) =>
    new EngineException(ErrorKind.VALIDATION, ErrorCode.INVALID_COUPON, message, { couponCode: code }),

  couponExists: (code: string) =>
    new EngineException(ErrorKind.STATE_CONFLICT, ErrorCode.COUPON_EXISTS, `Coupon ${code} already exists`, {
      couponCode: code,
    }),

  orderNotFound: (orderId: string) =>
    new EngineException(ErrorKind.NOT_FOUND, ErrorCode.ORDER_NOT_FOUND, `Order ${orderId} not found`, { orderId }),

  courierNotFound: (courierId: string) =>
    new EngineException(ErrorKind.NOT_FOUND, ErrorCode.COURIER_NOT_FOUND, `Courier ${courierId} not found`, {
      courierId,
    }),

  orderClosed: (orderId: string, status: OrderStatus) =>
    new EngineException(ErrorKind.STATE_CONFLICT, ErrorCode.ORDER_CLOSED, `Order ${orderId} is ${status} and closed`, {
      orderId,
      status,
    }),

  invalidTransition: (from: OrderStatus, to: OrderStatus) =>
    new EngineException(ErrorKind.STATE_CONFLICT, ErrorCode.INVALID_TRANSITION, `Cannot move order from ${from} to ${to}`, {
      from,
      to,
    }),

  roleNotPermitted: (role: ActorRole, from: OrderStatus, to: OrderStatus) =>
    new EngineException(
      ErrorKind.AUTHORIZATION,
      ErrorCode.ROLE_NOT_PERMITTED,
      `Role ${role} may not move an order from ${from} to ${to}`,
      { role, from, to },
    ),

  concurrentModification: (orderId: string, expectedVersion: number, actualVersion?: number) =>
    new EngineException(
      ErrorKind.CONCURRENCY_CONFLICT,
      ErrorCode.CONCURRENT_MODIFICATION,
      `Order ${orderId} was modified concurrently; re-read and retry`,
      { orderId, expectedVersion, actualVersion },
    ),

  actionNotPermitted: (role: ActorRole, action: string) =>
    new EngineException(ErrorKind.AUTHORIZATION, ErrorCode.ROLE_NOT_PERMITTED, `Role ${role} may not ${action}`, {
      role,
      action,
    }),

  unauthenticated: (message = 'A signed-in caller is required') =>
    new EngineException(ErrorKind.AUTHORIZATION, ErrorCode.UNAUTHENTICATED, message),

  notAssignedCourier: (orderId: string, courierId: string | undefined) =>
    new EngineException(
      ErrorKind.AUTHORIZATION,
      ErrorCode.NOT_ASSIGNED_COURIER,
      `Only the courier assigned to order ${orderId} may complete it`,
      { orderId, courierId },
    ),

  catalog: (
    code: ErrorCode.UNKNOWN_DISH | ErrorCode.DISH_UNAVAILABLE | ErrorCode.MIXED_RESTAURANTS | ErrorCode.UNKNOWN_RESTAURANT,
    message: string,
    details: Record<string, unknown> = {},
  ) => new EngineException(ErrorKind.VALIDATION, code, message, details),

  noCourierAvailable: (orderId: string, attempted: number) =>
    new EngineException(
      ErrorKind.RESOURCE_UNAVAILABLE,
      ErrorCode.NO_COURIER_AVAILABLE,
      `No courier available for order ${orderId}`,
      { orderId, attempted },
    ),

  dependencyFailure: (code: ErrorCode.CATALOG_UNAVAILABLE | ErrorCode.IDENTITY_UNAVAILABLE, reason: string) =>
    new EngineException(ErrorKind.DEPENDENCY_FAILURE, code, reason),
};
