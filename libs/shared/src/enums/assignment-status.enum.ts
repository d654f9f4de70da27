export enum AssignmentStatus {
  ASSIGNED = 'ASSIGNED',
  COMPLETED = 'COMPLETED',
  RELEASED = 'RELEASED',
  REASSIGNED = 'REASSIGNED',
}
