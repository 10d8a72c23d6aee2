export { ModuleGraphWalker } from './ModuleGraphWalker'
export { SnapshotOperation } from './SnapshotOperation'
export { StatusCollector } from './StatusCollector'
export type { SyncContext } from './SyncContext'
export { createSyncContext, SyncOperation } from './SyncOperation'
export { TransportOperation } from './TransportOperation'
