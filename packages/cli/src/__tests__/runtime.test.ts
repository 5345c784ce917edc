import { describe, it, expect } from 'vitest';
import { generateNetwork, generateService, generateSite } from '../generators/docker';
import { RuntimeCommunicationError } from '../errors';
import { forEnvironment, forService } from '../labels';
import { RuntimeInspector } from '../services/runtime.service';
import { FakeRuntime } from './helpers/fake-runtime';

describe('RuntimeInspector', () => {
  it('should find the network named after the environment', async () => {
    const runtime = new FakeRuntime();
    runtime.addNetwork(generateNetwork('dev'));
    runtime.addNetwork({ name: 'dev-old', labels: generateNetwork('dev').labels });
    const inspector = new RuntimeInspector(runtime);

    expect((await inspector.findNetwork('dev', forEnvironment('dev')))?.name).toBe('dev');
    expect(await inspector.findNetwork('staging', forEnvironment('staging'))).toBeNull();
  });

  it('should return matching containers sorted by name', async () => {
    const runtime = new FakeRuntime();
    runtime.addContainer(generateService('dev', 'redis'));
    runtime.addContainer(generateService('dev', 'mailhog'));
    runtime.addContainer(generateService('staging', 'mailhog'));
    const inspector = new RuntimeInspector(runtime);

    const all = await inspector.findContainers(forEnvironment('dev'));
    const mailhog = await inspector.findContainers(forService('dev', 'mailhog'));

    expect(all.map((c) => c.name)).toEqual(['dev-mailhog', 'dev-redis']);
    expect(mailhog.map((c) => c.name)).toEqual(['dev-mailhog']);
  });

  it('should return the mounts and hosts of a container', async () => {
    const runtime = new FakeRuntime();
    const config = { databases: [], services: { mailhog: false, redis: false, minio: false, dynamodb: false }, sites: [] };
    const spec = generateSite({ hostname: 'a.test', runtime: '8.2', path: '/srv/a' }, { environment: 'dev', home: '/home/dev', config });
    const container = runtime.addContainer(spec);
    const inspector = new RuntimeInspector(runtime);

    const [handle] = await inspector.findContainers(forEnvironment('dev'));
    const details = await inspector.inspectContainer(handle);

    expect(details.id).toBe(container.id);
    expect(details.mounts).toEqual([{ type: 'bind', source: '/srv/a', target: '/app' }]);
    expect(details.extraHosts).toEqual(['a.test:127.0.0.1']);
  });

  it('should wrap runtime failures', async () => {
    const runtime = new FakeRuntime();
    runtime.failures.set('listContainers', new Error('connect ENOENT /var/run/docker.sock'));
    const inspector = new RuntimeInspector(runtime);

    const find = inspector.findContainers(forEnvironment('dev'));

    await expect(find).rejects.toThrow(RuntimeCommunicationError);
    await expect(find).rejects.toThrow('unable to list the containers: connect ENOENT /var/run/docker.sock');
  });
});
