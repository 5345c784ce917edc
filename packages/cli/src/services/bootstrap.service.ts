/**
 * Bootstrap Service
 * Creates the environment's network and proxy container, which the apply
 * pass requires but never creates itself.
 */

import { generateNetwork, generateProxy } from '../generators/docker';
import { DriftResolutionError } from '../errors';
import { forEnvironment, forProxy } from '../labels';
import { silentReporter, type Reporter } from '../reporter';
import { classifyDrift, existenceOnly } from './drift.service';
import { RuntimeInspector, type ContainerRuntime, type NetworkHandle } from './runtime.service';

export interface BootstrapOptions {
  skipPull?: boolean;
  reporter?: Reporter;
}

export async function ensureNetwork(
  runtime: ContainerRuntime,
  environment: string,
  reporter: Reporter = silentReporter
): Promise<NetworkHandle> {
  const inspector = new RuntimeInspector(runtime);
  const existing = await inspector.findNetwork(environment, forEnvironment(environment));
  if (existing) {
    reporter.success('network ready');
    return existing;
  }

  reporter.pending(`creating network ${environment}`);
  try {
    const network = await runtime.createNetwork(generateNetwork(environment));
    reporter.done();
    return network;
  } catch (err) {
    reporter.warn();
    throw new DriftResolutionError('unable to create the network', { entity: environment, cause: err });
  }
}

export async function ensureProxy(
  runtime: ContainerRuntime,
  network: NetworkHandle,
  environment: string,
  options: BootstrapOptions = {}
): Promise<void> {
  const { skipPull = false, reporter = silentReporter } = options;
  const inspector = new RuntimeInspector(runtime);

  const state = await classifyDrift('proxy', await inspector.findContainers(forProxy(environment)), existenceOnly);
  if (state.kind === 'running-matching') {
    reporter.success('proxy ready');
    return;
  }

  const spec = generateProxy(environment);
  reporter.pending(state.kind === 'absent' ? 'creating the proxy' : 'starting the proxy');
  try {
    if (state.kind === 'absent') {
      if (!skipPull) await runtime.pullImage(spec.image);
      const id = await runtime.createContainer(spec, network);
      await runtime.startContainer(id);
    } else {
      await runtime.startContainer(state.container.id);
    }
    reporter.done();
  } catch (err) {
    reporter.warn();
    throw new DriftResolutionError('unable to set up the proxy', { entity: 'proxy', cause: err });
  }
}

/**
 * Make sure the network and proxy exist and run
 */
export async function bootstrapEnvironment(
  runtime: ContainerRuntime,
  environment: string,
  options: BootstrapOptions = {}
): Promise<void> {
  const network = await ensureNetwork(runtime, environment, options.reporter);
  await ensureProxy(runtime, network, environment, options);
}
