import type { TransportConfig } from '../config/schema';

export type Endpoint =
  | { kind: 'unix'; path: string }
  | { kind: 'tcp'; host: string; port: number };

export function endpointFromConfig(config: Pick<TransportConfig, 'socketPath' | 'host' | 'port'>): Endpoint {
  if (config.port !== undefined) {
    return { kind: 'tcp', host: config.host, port: config.port };
  }
  return { kind: 'unix', path: config.socketPath };
}

export function describeEndpoint(endpoint: Endpoint): string {
  return endpoint.kind === 'unix' ? endpoint.path : `${endpoint.host}:${endpoint.port}`;
}
