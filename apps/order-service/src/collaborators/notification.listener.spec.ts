import { Test, TestingModule } from '@nestjs/testing';
import { ActorRole, NotificationEvent, OrderStatus } from '@marketplace/shared';
import { NOTIFICATION_GATEWAY } from './notification.gateway';
import { NotificationListener } from './notification.listener';

describe('NotificationListener', () => {
  let listener: NotificationListener;

  const mockGateway = {
    notify: jest.fn(),
  };

  const occurredAt = new Date('2024-06-01T12:00:00Z');
  const transitioned = (toStatus: OrderStatus) => ({
    orderId: 'order-1',
    orderNumber: 'ORD-20240601-0001',
    customerId: 'customer-1',
    restaurantId: 'restaurant-1',
    fromStatus: OrderStatus.PENDING,
    toStatus,
    role: ActorRole.RESTAURANT,
    version: 2,
    occurredAt,
  });

  beforeEach(async () => {
    mockGateway.notify.mockResolvedValue(undefined);
    const module: TestingModule = await Test.createTestingModule({
      providers: [NotificationListener, { provide: NOTIFICATION_GATEWAY, useValue: mockGateway }],
    }).compile();

    listener = module.get<NotificationListener>(NotificationListener);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should tell the restaurant about a new order', async () => {
    await listener.onOrderCreated({
      orderId: 'order-1',
      orderNumber: 'ORD-20240601-0001',
      customerId: 'customer-1',
      restaurantId: 'restaurant-1',
      total: 40,
      couponCode: 'SAVE10',
      occurredAt,
    });

    expect(mockGateway.notify).toHaveBeenCalledWith('restaurant-1', NotificationEvent.NEW_ORDER, {
      orderId: 'order-1',
      orderNumber: 'ORD-20240601-0001',
      total: 40,
    });
  });

  it('should tell the customer when the order is confirmed', async () => {
    await listener.onOrderTransitioned(transitioned(OrderStatus.CONFIRMED));

    expect(mockGateway.notify).toHaveBeenCalledWith('customer-1', NotificationEvent.ORDER_CONFIRMED, {
      orderId: 'order-1',
      orderNumber: 'ORD-20240601-0001',
      status: OrderStatus.CONFIRMED,
    });
  });

  it('should stay quiet for kitchen-only steps', async () => {
    await listener.onOrderTransitioned(transitioned(OrderStatus.PREPARING));

    expect(mockGateway.notify).not.toHaveBeenCalled();
  });

  it('should tell a courier about an assignment and its release', async () => {
    const event = {
      orderId: 'order-1',
      orderNumber: 'ORD-20240601-0001',
      courierId: 'courier-1',
      restaurantId: 'restaurant-1',
      occurredAt,
    };

    await listener.onCourierAssigned(event);
    await listener.onCourierReleased({ ...event, reason: 'CANCELLED' });

    expect(mockGateway.notify.mock.calls).toEqual([
      [
        'courier-1',
        NotificationEvent.DELIVERY_ASSIGNED,
        { orderId: 'order-1', orderNumber: 'ORD-20240601-0001', restaurantId: 'restaurant-1' },
      ],
      [
        'courier-1',
        NotificationEvent.DELIVERY_UNASSIGNED,
        { orderId: 'order-1', orderNumber: 'ORD-20240601-0001', reason: 'CANCELLED' },
      ],
    ]);
  });

  it('should log and drop a failed send', async () => {
    mockGateway.notify.mockRejectedValue(new Error('broker down'));

    await expect(listener.onOrderTransitioned(transitioned(OrderStatus.DELIVERED))).resolves.toBeUndefined();
  });
});
