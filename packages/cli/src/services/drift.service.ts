/**
 * Drift Detection Service
 * Compares one desired entity with what the runtime has for it
 */

import { envKeys, type ContainerSpec } from '../generators/docker';
import { Labels } from '../labels';
import { DriftResolutionError } from '../errors';
import type { ContainerDetails, ContainerHandle } from './runtime.service';

/**
 * What reconciliation should do with one entity:
 * - absent: create it
 * - stopped-matching: start it
 * - running-matching: nothing
 * - mismatched: destroy and recreate (stopping first when it runs)
 */
export type DriftState =
  | { kind: 'absent' }
  | { kind: 'stopped-matching'; container: ContainerHandle }
  | { kind: 'running-matching'; container: ContainerHandle }
  | { kind: 'mismatched'; container: ContainerHandle; running: boolean; reasons: string[] };

/** Returns why a container differs from its desired spec; empty when it matches */
export type DriftCheck = (container: ContainerHandle) => Promise<string[]>;

/** Databases and services are matched on existence only */
export const existenceOnly: DriftCheck = async () => [];

export function isRunning(container: ContainerHandle): boolean {
  return container.state === 'running';
}

/**
 * Classify an entity from the containers its label predicate matched
 */
export async function classifyDrift(
  entity: string,
  matches: ContainerHandle[],
  check: DriftCheck
): Promise<DriftState> {
  if (matches.length === 0) {
    return { kind: 'absent' };
  }

  if (matches.length > 1) {
    throw new DriftResolutionError(
      `found ${matches.length} containers for ${entity} (${matches.map((c) => c.name).join(', ')}); remove the extra containers and re-run`,
      { entity }
    );
  }

  const container = matches[0];
  const running = isRunning(container);
  const reasons = await check(container);

  if (reasons.length > 0) {
    return { kind: 'mismatched', container, running, reasons };
  }

  return running ? { kind: 'running-matching', container } : { kind: 'stopped-matching', container };
}

function sameSet(a: Iterable<string>, b: Iterable<string>): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const item of left) {
    if (!right.has(item)) return false;
  }
  return true;
}

function bindMounts(mounts: ContainerSpec['mounts']): string[] {
  return mounts.filter((m) => m.type === 'bind').map((m) => `${m.source}:${m.target}`);
}

function listLabel(value: string | undefined): string[] {
  return value ? value.split(',').filter(Boolean) : [];
}

/**
 * Differences between a site container and its desired spec. Mounts and
 * extra hosts are compared as sets. Env is compared on the keys berth
 * manages, recorded in a label on the container; other env the image
 * defines is ignored.
 */
export function siteDrift(desired: ContainerSpec, actual: ContainerDetails): string[] {
  const reasons: string[] = [];

  if (actual.image !== desired.image) {
    reasons.push(`image is ${actual.image}, expected ${desired.image}`);
  }

  if (!sameSet(bindMounts(actual.mounts), bindMounts(desired.mounts))) {
    reasons.push('mounted paths changed');
  }

  if (!sameSet(actual.extraHosts, desired.extraHosts)) {
    reasons.push('hostnames changed');
  }

  const env = new Set(actual.env);
  const desiredKeys = new Set(envKeys(desired.env));
  const changed = new Set(envKeys(desired.env.filter((entry) => !env.has(entry))));
  for (const key of listLabel(actual.labels[Labels.envKeys])) {
    if (!desiredKeys.has(key)) changed.add(key);
  }
  if (changed.size > 0) {
    reasons.push(`environment changed (${[...changed].sort().join(', ')})`);
  }

  return reasons;
}
