export * from './order.entity';
export * from './courier.entity';
export * from './coupon.entity';
export * from './delivery-assignment.entity';
export * from './order-transition.entity';
export * from './order-sequence.entity';

import { Order } from './order.entity';
import { Courier } from './courier.entity';
import { Coupon } from './coupon.entity';
import { DeliveryAssignment } from './delivery-assignment.entity';
import { OrderTransition } from './order-transition.entity';
import { OrderSequence } from './order-sequence.entity';

export const ENTITIES = [Order, Courier, Coupon, DeliveryAssignment, OrderTransition, OrderSequence];
