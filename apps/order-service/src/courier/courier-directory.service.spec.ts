import { Test, TestingModule } from '@nestjs/testing';
import { COURIER_STORE } from '../persistence/courier.store';
import { EngineException, ErrorCode, ErrorKind } from '../common/errors/engine.exception';
import { InMemoryCourierStore } from '../../test/support/in-memory-stores';
import { CourierDirectoryService } from './courier-directory.service';

describe('CourierDirectoryService', () => {
  let directory: CourierDirectoryService;
  let store: InMemoryCourierStore;

  beforeEach(async () => {
    store = new InMemoryCourierStore();
    const module: TestingModule = await Test.createTestingModule({
      providers: [CourierDirectoryService, { provide: COURIER_STORE, useValue: store }],
    }).compile();

    directory = module.get<CourierDirectoryService>(CourierDirectoryService);
  });

  it('should register a courier on duty with no active orders', async () => {
    const courier = await directory.register({
      id: 'courier-1',
      name: 'Dana',
      position: { latitude: 40.71, longitude: -74.0 },
      capacity: 2,
    });

    expect(courier).toMatchObject({ id: 'courier-1', name: 'Dana', onDuty: true, activeOrderCount: 0, capacity: 2 });
    expect(courier.isAvailable).toBe(true);
  });

  it('should keep the active count when a courier is updated', async () => {
    store.put({ id: 'courier-1', position: { latitude: 0, longitude: 0 }, capacity: 3, activeOrderCount: 2 });

    const courier = await directory.register({
      id: 'courier-1',
      name: 'Dana',
      position: { latitude: 1, longitude: 1 },
      capacity: 4,
    });

    expect(courier.activeOrderCount).toBe(2);
    expect(courier.capacity).toBe(4);
  });

  it('should not lose a release that lands while the profile is being updated', async () => {
    store.put({ id: 'courier-1', position: { latitude: 0, longitude: 0 }, capacity: 2, activeOrderCount: 1 });

    // The order store releases couriers inside its own commit, outside the directory lock.
    const [courier] = await Promise.all([
      directory.register({ id: 'courier-1', name: 'Dana', position: { latitude: 1, longitude: 1 }, capacity: 3 }),
      store.release('courier-1'),
    ]);

    expect(courier.capacity).toBe(3);
    expect(store.couriers.get('courier-1')).toMatchObject({ activeOrderCount: 0, capacity: 3, name: 'Dana' });
  });

  it('should keep the duty flag when an update leaves it out', async () => {
    store.put({ id: 'courier-1', position: { latitude: 0, longitude: 0 }, capacity: 2, onDuty: false });

    const courier = await directory.register({
      id: 'courier-1',
      name: 'Dana',
      position: { latitude: 0, longitude: 0 },
      capacity: 2,
    });

    expect(courier.onDuty).toBe(false);
  });

  it('should reject a capacity below the orders already carried', async () => {
    store.put({ id: 'courier-1', position: { latitude: 0, longitude: 0 }, capacity: 3, activeOrderCount: 2 });

    await expect(
      directory.register({ id: 'courier-1', name: 'Dana', position: { latitude: 0, longitude: 0 }, capacity: 1 }),
    ).rejects.toMatchObject({ kind: ErrorKind.VALIDATION, code: ErrorCode.INVALID_COURIER });
  });

  it('should reject out-of-range positions and zero capacity', async () => {
    await expect(
      directory.register({ id: 'c', name: 'C', position: { latitude: 91, longitude: 0 }, capacity: 1 }),
    ).rejects.toBeInstanceOf(EngineException);
    await expect(
      directory.register({ id: 'c', name: 'C', position: { latitude: 0, longitude: 0 }, capacity: 0 }),
    ).rejects.toMatchObject({ code: ErrorCode.INVALID_COURIER });
  });

  it('should reserve until the courier is full', async () => {
    store.put({ id: 'courier-1', position: { latitude: 0, longitude: 0 }, capacity: 2 });

    await expect(directory.reserve('courier-1')).resolves.toEqual({ ok: true });
    await expect(directory.reserve('courier-1')).resolves.toEqual({ ok: true });
    await expect(directory.reserve('courier-1')).resolves.toEqual({ ok: false, reason: 'FULL' });
    expect(store.couriers.get('courier-1')?.activeOrderCount).toBe(2);
  });

  it('should not reserve an off-duty or unknown courier', async () => {
    store.put({ id: 'courier-1', position: { latitude: 0, longitude: 0 }, capacity: 2, onDuty: false });

    await expect(directory.reserve('courier-1')).resolves.toEqual({ ok: false, reason: 'FULL' });
    await expect(directory.reserve('ghost')).resolves.toEqual({ ok: false, reason: 'NOT_FOUND' });
  });

  it('should never exceed capacity under concurrent reservations', async () => {
    store.put({ id: 'courier-1', position: { latitude: 0, longitude: 0 }, capacity: 3 });

    const results = await Promise.all(Array.from({ length: 10 }, () => directory.reserve('courier-1')));

    expect(results.filter((result) => result.ok)).toHaveLength(3);
    expect(store.couriers.get('courier-1')?.activeOrderCount).toBe(3);
  });

  it('should never release below zero', async () => {
    store.put({ id: 'courier-1', position: { latitude: 0, longitude: 0 }, capacity: 2, activeOrderCount: 1 });

    await directory.release('courier-1');
    await directory.release('courier-1');

    expect(store.couriers.get('courier-1')?.activeOrderCount).toBe(0);
  });

  it('should list only couriers on duty with spare capacity', async () => {
    store.put({ id: 'free', position: { latitude: 0, longitude: 0 }, capacity: 2, activeOrderCount: 1 });
    store.put({ id: 'full', position: { latitude: 0, longitude: 0 }, capacity: 1, activeOrderCount: 1 });
    store.put({ id: 'off', position: { latitude: 0, longitude: 0 }, capacity: 2, onDuty: false });

    const available = await directory.listAvailable();

    expect(available.map((courier) => courier.id)).toEqual(['free']);
  });

  it('should toggle duty and move couriers', async () => {
    store.put({ id: 'courier-1', position: { latitude: 0, longitude: 0 }, capacity: 2 });

    await expect(directory.setAvailability('courier-1', false)).resolves.toMatchObject({ onDuty: false });
    await expect(directory.updateLocation('courier-1', { latitude: 10, longitude: 20 })).resolves.toMatchObject({
      position: { latitude: 10, longitude: 20 },
    });
    await expect(directory.setAvailability('ghost', true)).rejects.toMatchObject({
      kind: ErrorKind.NOT_FOUND,
      code: ErrorCode.COURIER_NOT_FOUND,
    });
  });
});
