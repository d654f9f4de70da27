export * from './kafka.module';
export * from './kafka.client';
export * from './kafka.publisher';
