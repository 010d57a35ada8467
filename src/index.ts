// Main entry point for the tick-consistency library

// Types
export * from './types';
export { HARNESS_VERSION } from './version';

// Common
export * from './common/Clock';
export * from './common/logger';
export * from './common/utils';

// Configuration
export * from './config/HarnessConfig';

// Harness
export * from './harness/TickScheduler';
export * from './harness/ConnectionTracker';
export * from './harness/exchange';
export * from './harness/types';
export * from './harness/ServerRole';
export * from './harness/ClientRole';

// Statistics
export * from './stats/ConsistencyStats';
export * from './stats/RunRecorder';
export * from './stats/report';

// Transport
export * from './transport/Transport';
export * from './transport/protocol';
export * from './diagnostics/FaultInjector';
export { InMemoryNetwork, InMemoryServerTransport, InMemoryClientTransport } from './transport/adapters/InMemoryTransport';
export type { InMemoryNetworkOptions } from './transport/adapters/InMemoryTransport';
export { NetServerTransport } from './transport/adapters/NetServerTransport';
export type { NetServerTransportOptions } from './transport/adapters/NetServerTransport';
export { NetClientTransport } from './transport/adapters/NetClientTransport';
export type { NetClientTransportOptions } from './transport/adapters/NetClientTransport';
