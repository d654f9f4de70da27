// Enums
export * from './enums/order-status.enum';
export * from './enums/actor-role.enum';
export * from './enums/discount-type.enum';
export * from './enums/assignment-status.enum';

// Core domain types
export * from './types/order.types';
export * from './types/courier.types';
export * from './types/coupon.types';

// Event types
export * from './events/order.events';

// Utilities
export * from './utils/geo.utils';
export * from './utils/money.utils';
export * from './utils/uuid.utils';
export * from './utils/error.utils';
