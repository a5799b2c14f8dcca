export { default as PositionPoller } from './PositionPoller';
export type { PositionPollerOptions, PositionSnapshotSource } from './PositionPoller';
