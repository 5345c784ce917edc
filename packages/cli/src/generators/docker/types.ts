/**
 * Types for container generation
 * Runtime-neutral descriptions of what berth asks the container engine to create
 */

export interface PortBinding {
  containerPort: number;
  hostPort: number;
  protocol: 'tcp' | 'udp';
  hostIp: string;
}

export interface MountSpec {
  type: 'bind' | 'volume';
  /** Host path for binds, volume name for volumes, empty for an anonymous volume */
  source: string;
  target: string;
}

export interface ContainerSpec {
  name: string;
  image: string;
  labels: Record<string, string>;
  env: string[];
  cmd?: string[];
  ports: PortBinding[];
  mounts: MountSpec[];
  extraHosts: string[];
  /** Extra names the container answers to on the environment network */
  networkAliases: string[];
}

export interface VolumeSpec {
  name: string;
  labels: Record<string, string>;
}

export interface NetworkSpec {
  name: string;
  labels: Record<string, string>;
}

/**
 * A database container comes with the volume that stores its data
 */
export interface DatabaseResources {
  hostname: string;
  volume: VolumeSpec;
  container: ContainerSpec;
}

export const LOOPBACK = '127.0.0.1';
