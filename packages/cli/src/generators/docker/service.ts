/**
 * Auxiliary service generators
 * Mail capture, cache, object storage and a local DynamoDB
 */

import type { ServiceName } from '@berth/config';
import { Labels, forService } from '../../labels';
import { LOOPBACK, type ContainerSpec, type MountSpec, type PortBinding } from './types';

export interface ServiceDefinition {
  name: ServiceName;
  description: string;
  image: string;
  ports: Array<{ port: number; protocol?: 'tcp' | 'udp' }>;
  /** Data directories, backed by anonymous volumes removed with the container */
  volumes: string[];
  env: string[];
  cmd?: string[];
}

export const SERVICES: Record<ServiceName, ServiceDefinition> = {
  mailhog: {
    name: 'mailhog',
    description: 'SMTP capture with a web inbox',
    image: 'docker.io/mailhog/mailhog:latest',
    ports: [{ port: 1025 }, { port: 8025 }],
    volumes: [],
    env: [],
  },
  redis: {
    name: 'redis',
    description: 'Redis cache',
    image: 'docker.io/library/redis:7',
    ports: [{ port: 6379 }],
    volumes: ['/data'],
    env: [],
  },
  minio: {
    name: 'minio',
    description: 'S3 compatible object storage',
    image: 'docker.io/minio/minio:latest',
    ports: [{ port: 9000 }, { port: 9001 }],
    volumes: ['/data'],
    env: ['MINIO_ROOT_USER=berth', 'MINIO_ROOT_PASSWORD=berth-password'],
    cmd: ['server', '/data', '--console-address', ':9001'],
  },
  dynamodb: {
    name: 'dynamodb',
    description: 'DynamoDB local',
    image: 'docker.io/amazon/dynamodb-local:latest',
    ports: [{ port: 8000 }],
    volumes: [],
    env: [],
  },
};

export function serviceContainerName(environment: string, service: ServiceName): string {
  return `${environment}-${service}`;
}

/**
 * Generate the container for a service. Ports are published on loopback
 * under the same number they use inside the container.
 */
export function generateService(environment: string, service: ServiceName): ContainerSpec {
  const definition = SERVICES[service];

  const ports: PortBinding[] = definition.ports.map(({ port, protocol = 'tcp' }) => ({
    containerPort: port,
    hostPort: port,
    protocol,
    hostIp: LOOPBACK,
  }));

  const spec: ContainerSpec = {
    name: serviceContainerName(environment, service),
    image: definition.image,
    labels: forService(environment, service).with(Labels.managed, 'true').toLabels(),
    env: [...definition.env],
    ports,
    mounts: definition.volumes.map((target): MountSpec => ({ type: 'volume', source: '', target })),
    extraHosts: [],
    networkAliases: [service],
  };

  if (definition.cmd) {
    spec.cmd = [...definition.cmd];
  }

  return spec;
}
