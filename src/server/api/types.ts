import { Counters } from '../metrics/counters.js';
import { ConnectionRegistry } from '../relay/connection-registry.js';
import type { ServerMetrics } from '../types.js';

export interface ServerContext {
  port: number;
  enableCors: boolean;
  registry: ConnectionRegistry;
  counters: Counters;
  getMetrics: () => ServerMetrics;
}
