import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  CourierAssignmentEvent,
  NotificationEvent,
  OrderCreatedEvent,
  OrderEventType,
  OrderStatus,
  OrderTransitionedEvent,
  describeError,
} from '@marketplace/shared';
import { NOTIFICATION_GATEWAY, NotificationGateway } from './notification.gateway';

const CUSTOMER_EVENTS: Partial<Record<OrderStatus, NotificationEvent>> = {
  [OrderStatus.CONFIRMED]: NotificationEvent.ORDER_CONFIRMED,
  [OrderStatus.OUT_FOR_DELIVERY]: NotificationEvent.ORDER_OUT_FOR_DELIVERY,
  [OrderStatus.DELIVERED]: NotificationEvent.ORDER_DELIVERED,
  [OrderStatus.CANCELLED]: NotificationEvent.ORDER_CANCELLED,
};

/**
 * Turns committed order events into user notifications. Runs after the commit and
 * outside any order lock; a failed send is logged and dropped.
 */
@Injectable()
export class NotificationListener {
  private readonly logger = new Logger(NotificationListener.name);

  constructor(@Inject(NOTIFICATION_GATEWAY) private readonly gateway: NotificationGateway) {}

  @OnEvent(OrderEventType.ORDER_CREATED, { async: true })
  async onOrderCreated(event: OrderCreatedEvent): Promise<void> {
    await this.send(event.restaurantId, NotificationEvent.NEW_ORDER, {
      orderId: event.orderId,
      orderNumber: event.orderNumber,
      total: event.total,
    });
  }

  @OnEvent(OrderEventType.ORDER_TRANSITIONED, { async: true })
  async onOrderTransitioned(event: OrderTransitionedEvent): Promise<void> {
    const notification = CUSTOMER_EVENTS[event.toStatus];
    if (!notification) {
      return;
    }
    await this.send(event.customerId, notification, {
      orderId: event.orderId,
      orderNumber: event.orderNumber,
      status: event.toStatus,
    });
  }

  @OnEvent(OrderEventType.COURIER_ASSIGNED, { async: true })
  async onCourierAssigned(event: CourierAssignmentEvent): Promise<void> {
    await this.send(event.courierId, NotificationEvent.DELIVERY_ASSIGNED, {
      orderId: event.orderId,
      orderNumber: event.orderNumber,
      restaurantId: event.restaurantId,
    });
  }

  @OnEvent(OrderEventType.COURIER_RELEASED, { async: true })
  async onCourierReleased(event: CourierAssignmentEvent): Promise<void> {
    await this.send(event.courierId, NotificationEvent.DELIVERY_UNASSIGNED, {
      orderId: event.orderId,
      orderNumber: event.orderNumber,
      reason: event.reason,
    });
  }

  private async send(userId: string, event: NotificationEvent, payload: Record<string, unknown>): Promise<void> {
    try {
      await this.gateway.notify(userId, event, payload);
    } catch (error) {
      this.logger.error(`Failed to notify ${userId} of ${event}`, { userId, event, error: describeError(error) });
    }
  }
}
