/**
 * Proxy container and network generators, used when an environment is
 * first set up
 */

import { Labels, forEnvironment, forProxy } from '../../labels';
import { LOOPBACK, type ContainerSpec, type NetworkSpec, type PortBinding } from './types';

export const PROXY_VERSION = '1.0.0';
export const PROXY_IMAGE = `docker.io/berthdev/proxy:${PROXY_VERSION}`;

/** Port of the proxy's routing API */
export const PROXY_API_PORT = 5000;

export function generateNetwork(environment: string): NetworkSpec {
  return {
    name: environment,
    labels: forEnvironment(environment).with(Labels.managed, 'true').toLabels(),
  };
}

/**
 * The proxy is named after its environment and publishes HTTP, HTTPS and
 * its routing API on loopback.
 */
export function generateProxy(environment: string): ContainerSpec {
  return {
    name: environment,
    image: PROXY_IMAGE,
    labels: forProxy(environment)
      .with(Labels.managed, 'true')
      .with(Labels.proxyVersion, PROXY_VERSION)
      .toLabels(),
    env: [],
    ports: [80, 443, PROXY_API_PORT].map((port): PortBinding => ({
      containerPort: port,
      hostPort: port,
      protocol: 'tcp',
      hostIp: LOOPBACK,
    })),
    mounts: [],
    extraHosts: [],
    networkAliases: ['proxy'],
  };
}
