/**
 * Convergence Service
 *
 * One apply pass: brings the runtime in line with an environment config.
 * Entities are reconciled one at a time in dependency order
 * (network, proxy, databases, services, sites), then the routing table is
 * pushed to the proxy and the hostnames registered with the OS.
 *
 * Nothing is rolled back. A container that was created but failed to start
 * is found as stopped by the next pass and started then.
 */

import {
  SERVICE_NAMES,
  allHostnames,
  type EnvironmentConfig,
  type SiteConfig,
  type DatabaseConfig,
  type ServiceName,
} from '@berth/config';
import {
  SERVICES,
  generateDatabase,
  generateService,
  generateSite,
  type ContainerSpec,
} from '../generators/docker';
import { CancelledError, DriftResolutionError, HostsSyncError, PreconditionError } from '../errors';
import { forDatabase, forEnvironment, forProxy, forService, forSite } from '../labels';
import { silentLogger, type Logger } from '../logger';
import { silentReporter, type Reporter } from '../reporter';
import { classifyDrift, existenceOnly, siteDrift, type DriftState } from './drift.service';
import { shouldSyncHosts } from './hosts.service';
import {
  buildRoutingTable,
  syncRoutes,
  type ProxyClient,
  type ReadinessOptions,
  type RoutingTable,
} from './proxy-client.service';
import {
  RuntimeInspector,
  type ContainerHandle,
  type ContainerRuntime,
  type NetworkHandle,
} from './runtime.service';

/**
 * What a failed stop or remove during teardown does to the pass.
 * Services are best-effort so a stuck auxiliary container never blocks
 * the sites; sites are fatal so a site is never recreated on top of one
 * that could not be removed.
 */
export type FailurePolicy = 'fatal' | 'best-effort';

export interface ReconcilePolicy {
  serviceTeardown: FailurePolicy;
  siteTeardown: FailurePolicy;
}

export const DEFAULT_POLICY: ReconcilePolicy = {
  serviceTeardown: 'best-effort',
  siteTeardown: 'fatal',
};

export type OperationKind = 'pull' | 'create-volume' | 'create' | 'start' | 'stop' | 'remove';

export interface Operation {
  kind: OperationKind;
  target: string;
}

export interface ApplyRequest {
  environment: string;
  home: string;
  config: EnvironmentConfig;
  skipPull?: boolean;
  skipHosts?: boolean;
  policy?: Partial<ReconcilePolicy>;
  signal?: AbortSignal;
}

export interface ApplyDependencies {
  runtime: ContainerRuntime;
  proxy: ProxyClient;
  /** Registers hostnames with the OS resolver, usually through the sudo helper */
  syncHosts: (hostnames: string[]) => Promise<void>;
  reporter?: Reporter;
  logger?: Logger;
  readiness?: Omit<ReadinessOptions, 'signal'>;
  env?: NodeJS.ProcessEnv;
}

export interface ApplyResult {
  environment: string;
  /** Every mutating runtime call issued, in order */
  operations: Operation[];
  routes: RoutingTable;
  hostsSynced: boolean;
}

interface ConvergeActions {
  create: () => Promise<void>;
  /** Absent for entities matched on existence only */
  recreate?: (container: ContainerHandle, running: boolean, reasons: string[]) => Promise<void>;
}

class ConvergencePass {
  readonly operations: Operation[] = [];
  private readonly inspector: RuntimeInspector;
  private readonly reporter: Reporter;
  private readonly logger: Logger;
  private readonly policy: ReconcilePolicy;
  private network: NetworkHandle | null = null;

  constructor(
    private readonly request: ApplyRequest,
    private readonly deps: ApplyDependencies
  ) {
    this.inspector = new RuntimeInspector(deps.runtime);
    this.reporter = deps.reporter || silentReporter;
    this.logger = deps.logger || silentLogger;
    this.policy = { ...DEFAULT_POLICY, ...request.policy };
  }

  private get environment(): string {
    return this.request.environment;
  }

  private get config(): EnvironmentConfig {
    return this.request.config;
  }

  private requireNetwork(): NetworkHandle {
    if (!this.network) {
      throw new PreconditionError('the network must be checked before containers are created', {
        entity: this.environment,
      });
    }
    return this.network;
  }

  /**
   * Issue one mutating runtime call, recording it and attributing any
   * failure to the entity being reconciled
   */
  private async issue<T>(kind: OperationKind, target: string, failure: string, call: () => Promise<T>): Promise<T> {
    if (this.request.signal?.aborted) {
      this.reporter.warn();
      throw new CancelledError(`cancelled before ${kind} ${target}`, { entity: target });
    }

    this.operations.push({ kind, target });
    this.logger.operation(kind, target);
    try {
      return await call();
    } catch (err) {
      this.reporter.warn();
      throw new DriftResolutionError(failure, { entity: target, cause: err });
    }
  }

  private async pull(image: string): Promise<void> {
    if (this.request.skipPull) return;

    this.reporter.pending(`pulling ${image}`);
    await this.issue('pull', image, `unable to pull image ${image}`, () => this.deps.runtime.pullImage(image));
    this.reporter.done();
  }

  private async createAndStart(spec: ContainerSpec): Promise<void> {
    const network = this.requireNetwork();
    const id = await this.issue('create', spec.name, `unable to create ${spec.name}`, () =>
      this.deps.runtime.createContainer(spec, network)
    );
    await this.issue('start', spec.name, `unable to start ${spec.name}`, () => this.deps.runtime.startContainer(id));
  }

  private async start(container: ContainerHandle): Promise<void> {
    this.reporter.pending(`starting ${container.name}`);
    await this.issue('start', container.name, `unable to start ${container.name}`, () =>
      this.deps.runtime.startContainer(container.id)
    );
    this.reporter.done();
  }

  /**
   * Stop (when running) and remove a container under the given policy
   */
  private async teardown(container: ContainerHandle, policy: FailurePolicy, volumes: boolean): Promise<void> {
    const steps: Array<[OperationKind, () => Promise<void>]> = [];
    if (container.state === 'running') {
      steps.push(['stop', () => this.deps.runtime.stopContainer(container.id)]);
    }
    steps.push(['remove', () => this.deps.runtime.removeContainer(container.id, { volumes })]);

    for (const [kind, call] of steps) {
      try {
        await this.issue(kind, container.name, `unable to ${kind} ${container.name}`, call);
      } catch (err) {
        if (policy === 'fatal' || err instanceof CancelledError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        this.reporter.warn(message);
        this.logger.warn(`ignored teardown failure for ${container.name}`, err);
      }
    }
  }

  private async converge(entity: string, state: DriftState, actions: ConvergeActions): Promise<void> {
    switch (state.kind) {
      case 'absent':
        await actions.create();
        return;
      case 'stopped-matching':
        await this.start(state.container);
        return;
      case 'running-matching':
        this.reporter.success(`${entity} ready`);
        return;
      case 'mismatched':
        if (actions.recreate) {
          await actions.recreate(state.container, state.running, state.reasons);
        } else if (state.running) {
          this.reporter.success(`${entity} ready`);
        } else {
          await this.start(state.container);
        }
        return;
    }
  }

  // ===========================================================================
  // Entity kinds
  // ===========================================================================

  async checkNetwork(): Promise<void> {
    this.reporter.info('Checking Network...');

    this.network = await this.inspector.findNetwork(this.environment, forEnvironment(this.environment));
    if (!this.network) {
      throw new PreconditionError(`unable to find the network for ${this.environment}, run \`berth init\` first`, {
        entity: this.environment,
      });
    }

    this.reporter.success('network ready');
  }

  async checkProxy(): Promise<void> {
    this.reporter.info('Checking Proxy...');

    const matches = await this.inspector.findContainers(forProxy(this.environment));
    const state = await classifyDrift('proxy', matches, existenceOnly);

    await this.converge('proxy', state, {
      create: async () => {
        throw new PreconditionError(`unable to find the proxy for ${this.environment}, run \`berth init\` first`, {
          entity: this.environment,
        });
      },
    });
  }

  async checkDatabase(db: DatabaseConfig): Promise<void> {
    const resources = generateDatabase(this.environment, db);
    const { hostname, volume, container } = resources;

    const matches = await this.inspector.findContainers(forDatabase(this.environment, db));
    const state = await classifyDrift(hostname, matches, existenceOnly);

    await this.converge(hostname, state, {
      create: async () => {
        this.reporter.pending(`creating volume ${hostname}`);
        await this.issue('create-volume', volume.name, `unable to create the volume ${volume.name}`, () =>
          this.deps.runtime.createVolume(volume)
        );
        this.reporter.done();

        await this.pull(container.image);

        this.reporter.pending(`creating ${hostname}`);
        await this.createAndStart(container);
        this.reporter.done();
      },
    });
  }

  async checkService(name: ServiceName): Promise<void> {
    const matches = await this.inspector.findContainers(forService(this.environment, name));

    if (!this.config.services[name]) {
      if (matches.length === 0) return;

      this.reporter.pending(`removing ${name}`);
      for (const container of matches) {
        await this.teardown(container, this.policy.serviceTeardown, true);
      }
      this.reporter.done();
      return;
    }

    const state = await classifyDrift(name, matches, existenceOnly);
    await this.converge(name, state, {
      create: async () => {
        const spec = generateService(this.environment, name);
        await this.pull(spec.image);

        this.reporter.pending(`creating ${name} service`);
        await this.createAndStart(spec);
        this.reporter.done();
      },
    });
  }

  async checkSite(site: SiteConfig): Promise<void> {
    const spec = generateSite(site, {
      environment: this.environment,
      home: this.request.home,
      config: this.config,
    });

    const matches = await this.inspector.findContainers(forSite(this.environment, site.hostname));
    const state = await classifyDrift(site.hostname, matches, async (container) =>
      siteDrift(spec, await this.inspector.inspectContainer(container))
    );

    const create = async () => {
      await this.pull(spec.image);

      this.reporter.pending(`creating ${site.hostname}`);
      await this.createAndStart(spec);
      this.reporter.done();
    };

    await this.converge(site.hostname, state, {
      create,
      recreate: async (container, _running, reasons) => {
        this.reporter.pending(`${site.hostname} out of sync (${reasons.join('; ')})`);
        this.logger.info(`recreating ${site.hostname}`, { reasons });
        await this.teardown(container, this.policy.siteTeardown, false);
        this.reporter.done();

        await create();
      },
    });
  }

  async run(): Promise<ApplyResult> {
    await this.checkNetwork();
    await this.checkProxy();

    this.reporter.info('Checking Databases...');
    for (const db of this.config.databases) {
      await this.checkDatabase(db);
    }

    this.reporter.info('Checking Services...');
    for (const name of SERVICE_NAMES) {
      await this.checkService(name);
    }

    this.reporter.info('Checking Sites...');
    for (const site of this.config.sites) {
      await this.checkSite(site);
    }

    const routes = buildRoutingTable(this.config.sites);

    this.reporter.info('Configuring Proxy...');
    this.reporter.pending('waiting for the proxy');
    try {
      await syncRoutes(this.deps.proxy, routes, { ...this.deps.readiness, signal: this.request.signal });
    } catch (err) {
      this.reporter.warn();
      throw err;
    }
    this.reporter.done();
    this.reporter.success('proxy ready');

    let hostsSynced = false;
    if (shouldSyncHosts(Boolean(this.request.skipHosts), this.deps.env)) {
      this.reporter.info('Modifying hosts file (you might be prompted for your password)');
      try {
        await this.deps.syncHosts(allHostnames(this.config));
      } catch (err) {
        throw new HostsSyncError(`${this.environment} is running, but its hostnames were not registered`, {
          entity: this.environment,
          cause: err,
        });
      }
      hostsSynced = true;
    }

    return {
      environment: this.environment,
      operations: this.operations,
      routes,
      hostsSynced,
    };
  }
}

/**
 * Run one convergence pass for an environment
 */
export async function applyEnvironment(request: ApplyRequest, deps: ApplyDependencies): Promise<ApplyResult> {
  return new ConvergencePass(request, deps).run();
}

/**
 * Every image an environment uses, for pre-pulling
 */
export function environmentImages(environment: string, home: string, config: EnvironmentConfig): string[] {
  const images = new Set<string>();
  for (const db of config.databases) {
    images.add(generateDatabase(environment, db).container.image);
  }
  for (const name of SERVICE_NAMES) {
    if (config.services[name]) images.add(SERVICES[name].image);
  }
  for (const site of config.sites) {
    images.add(generateSite(site, { environment, home, config }).image);
  }
  return [...images];
}
