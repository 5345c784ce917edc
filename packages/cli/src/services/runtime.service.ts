/**
 * Container Runtime Service
 * The Docker Engine boundary: listing, inspecting and mutating the
 * networks, volumes and containers berth manages
 */

import Docker from 'dockerode';
import type { ContainerSpec, MountSpec, NetworkSpec, VolumeSpec } from '../generators/docker';
import { RuntimeCommunicationError } from '../errors';
import type { LabelPredicate } from '../labels';

export interface NetworkHandle {
  id: string;
  name: string;
}

export interface ContainerHandle {
  id: string;
  name: string;
  image: string;
  state: string;
  labels: Record<string, string>;
}

export interface ContainerDetails {
  id: string;
  name: string;
  image: string;
  labels: Record<string, string>;
  env: string[];
  mounts: MountSpec[];
  extraHosts: string[];
}

export interface ContainerRuntime {
  listNetworks(filters: string[]): Promise<NetworkHandle[]>;
  /** Lists stopped containers too */
  listContainers(filters: string[]): Promise<ContainerHandle[]>;
  inspectContainer(id: string): Promise<ContainerDetails>;
  createNetwork(spec: NetworkSpec): Promise<NetworkHandle>;
  createVolume(spec: VolumeSpec): Promise<string>;
  createContainer(spec: ContainerSpec, network: NetworkHandle): Promise<string>;
  startContainer(id: string): Promise<void>;
  stopContainer(id: string): Promise<void>;
  removeContainer(id: string, options: { volumes: boolean }): Promise<void>;
  /** Resolves once the pull has finished, not when it starts */
  pullImage(image: string): Promise<void>;
}

function trimName(name: string): string {
  return name.replace(/^\//, '');
}

function toStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * ContainerRuntime backed by the Docker Engine API
 */
export class DockerRuntime implements ContainerRuntime {
  private readonly docker: Docker;

  constructor(docker: Docker = new Docker()) {
    this.docker = docker;
  }

  async listNetworks(filters: string[]): Promise<NetworkHandle[]> {
    const networks = await this.docker.listNetworks({ filters: { label: filters } });
    return networks.map((n) => ({ id: n.Id, name: n.Name }));
  }

  async listContainers(filters: string[]): Promise<ContainerHandle[]> {
    const containers = await this.docker.listContainers({ all: true, filters: { label: filters } });
    return containers.map((c) => ({
      id: c.Id,
      name: trimName(c.Names[0] || c.Id),
      image: c.Image,
      state: c.State,
      labels: c.Labels || {},
    }));
  }

  async inspectContainer(id: string): Promise<ContainerDetails> {
    const info = await this.docker.getContainer(id).inspect();
    return {
      id: info.Id,
      name: trimName(info.Name),
      image: info.Config.Image,
      labels: info.Config.Labels || {},
      env: toStrings(info.Config.Env),
      mounts: (info.HostConfig.Mounts || [])
        .filter((m) => m.Type === 'bind' || m.Type === 'volume')
        .map((m): MountSpec => ({
          type: m.Type === 'bind' ? 'bind' : 'volume',
          source: m.Source || '',
          target: m.Target,
        })),
      extraHosts: toStrings(info.HostConfig.ExtraHosts),
    };
  }

  async createNetwork(spec: NetworkSpec): Promise<NetworkHandle> {
    const network = await this.docker.createNetwork({
      Name: spec.name,
      Driver: 'bridge',
      Labels: spec.labels,
      CheckDuplicate: true,
    });
    return { id: network.id, name: spec.name };
  }

  async createVolume(spec: VolumeSpec): Promise<string> {
    const volume = await this.docker.createVolume({ Name: spec.name, Driver: 'local', Labels: spec.labels });
    return volume.Name;
  }

  async createContainer(spec: ContainerSpec, network: NetworkHandle): Promise<string> {
    const exposedPorts: Record<string, object> = {};
    const portBindings: Record<string, Array<{ HostIp: string; HostPort: string }>> = {};
    for (const port of spec.ports) {
      const key = `${port.containerPort}/${port.protocol}`;
      exposedPorts[key] = {};
      portBindings[key] = [{ HostIp: port.hostIp, HostPort: String(port.hostPort) }];
    }

    const container = await this.docker.createContainer({
      name: spec.name,
      Image: spec.image,
      Labels: spec.labels,
      Env: spec.env,
      Cmd: spec.cmd,
      ExposedPorts: exposedPorts,
      HostConfig: {
        Mounts: spec.mounts.map((m) => ({ Type: m.type, Source: m.source, Target: m.target })),
        PortBindings: portBindings,
        ExtraHosts: spec.extraHosts,
      },
      NetworkingConfig: {
        EndpointsConfig: {
          [network.name]: { NetworkID: network.id, Aliases: spec.networkAliases },
        },
      },
    });
    return container.id;
  }

  async startContainer(id: string): Promise<void> {
    await this.docker.getContainer(id).start();
  }

  async stopContainer(id: string): Promise<void> {
    await this.docker.getContainer(id).stop();
  }

  async removeContainer(id: string, options: { volumes: boolean }): Promise<void> {
    await this.docker.getContainer(id).remove({ v: options.volumes });
  }

  async pullImage(image: string): Promise<void> {
    const stream: NodeJS.ReadableStream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => (err ? reject(err) : resolve()));
    });
  }
}

// =============================================================================
// Inspector
// =============================================================================

/**
 * Read side of the runtime. Every failure is a RuntimeCommunicationError
 * and is not retried here.
 */
export class RuntimeInspector {
  constructor(private readonly runtime: ContainerRuntime) {}

  /**
   * Find the network for an environment: labelled with the environment and
   * named after it
   */
  async findNetwork(environment: string, predicate: LabelPredicate): Promise<NetworkHandle | null> {
    let networks: NetworkHandle[];
    try {
      networks = await this.runtime.listNetworks(predicate.toFilters());
    } catch (err) {
      throw new RuntimeCommunicationError('unable to list docker networks', { entity: environment, cause: err });
    }
    return networks.find((n) => n.name === environment) || null;
  }

  /**
   * Containers matching every label in the predicate, sorted by name
   */
  async findContainers(predicate: LabelPredicate): Promise<ContainerHandle[]> {
    let containers: ContainerHandle[];
    try {
      containers = await this.runtime.listContainers(predicate.toFilters());
    } catch (err) {
      throw new RuntimeCommunicationError('unable to list the containers', {
        entity: predicate.toFilters().join(','),
        cause: err,
      });
    }
    return containers
      .filter((c) => predicate.matches(c.labels))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async inspectContainer(handle: ContainerHandle): Promise<ContainerDetails> {
    try {
      return await this.runtime.inspectContainer(handle.id);
    } catch (err) {
      throw new RuntimeCommunicationError(`unable to inspect container ${handle.name}`, {
        entity: handle.name,
        cause: err,
      });
    }
  }
}
