/**
 * Roles a caller can act under. DISPATCH is never issued to a user; the engine
 * takes it when it advances an order on behalf of the dispatch pipeline.
 */
export enum ActorRole {
  CUSTOMER = 'CUSTOMER',
  RESTAURANT = 'RESTAURANT',
  COURIER = 'COURIER',
  ADMIN = 'ADMIN',
  DISPATCH = 'DISPATCH',
}

export const USER_ROLES: readonly ActorRole[] = [
  ActorRole.CUSTOMER,
  ActorRole.RESTAURANT,
  ActorRole.COURIER,
  ActorRole.ADMIN,
];
