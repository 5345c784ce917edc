/**
 * Container labels used to find berth resources in the runtime.
 * Resources are always matched on label equality, never on name alone.
 */

import type { DatabaseConfig, DatabaseEngine, ServiceName } from '@berth/config';

export const Labels = {
  /** Marks any object created by berth */
  managed: 'dev.berth',
  environment: 'dev.berth.environment',
  type: 'dev.berth.type',
  /** Primary hostname of a site container */
  host: 'dev.berth.host',
  proxy: 'dev.berth.proxy',
  proxyVersion: 'dev.berth.proxy-version',
  databaseEngine: 'dev.berth.database-engine',
  databaseVersion: 'dev.berth.database-version',
  databasePort: 'dev.berth.database-port',
  /** mysql and mariadb share a wire protocol and are both "mysql" here */
  databaseCompatibility: 'dev.berth.database-compatibility',
  service: 'dev.berth.service',
  /** Comma separated env keys berth set on a site container */
  envKeys: 'dev.berth.env-keys',
} as const;

export type ResourceType = 'proxy' | 'database' | 'service' | 'site';

/**
 * An immutable set of label=value pairs. `with` returns a new predicate,
 * so a predicate built for one entity can never leak into the next.
 */
export class LabelPredicate {
  private readonly pairs: ReadonlyMap<string, string>;

  private constructor(pairs: ReadonlyMap<string, string>) {
    this.pairs = pairs;
  }

  static of(labels: Record<string, string>): LabelPredicate {
    return new LabelPredicate(new Map(Object.entries(labels)));
  }

  with(key: string, value: string): LabelPredicate {
    const next = new Map(this.pairs);
    next.set(key, value);
    return new LabelPredicate(next);
  }

  /**
   * Filters in the runtime's `key=value` form, sorted for stable output
   */
  toFilters(): string[] {
    return [...this.pairs.entries()].map(([key, value]) => `${key}=${value}`).sort();
  }

  toLabels(): Record<string, string> {
    return Object.fromEntries(this.pairs);
  }

  matches(labels: Record<string, string>): boolean {
    for (const [key, value] of this.pairs) {
      if (labels[key] !== value) return false;
    }
    return true;
  }
}

export function forEnvironment(environment: string): LabelPredicate {
  return LabelPredicate.of({ [Labels.environment]: environment });
}

export function forProxy(environment: string): LabelPredicate {
  return forEnvironment(environment).with(Labels.type, 'proxy').with(Labels.proxy, environment);
}

export function forDatabase(environment: string, db: Pick<DatabaseConfig, 'engine' | 'version'>): LabelPredicate {
  return forEnvironment(environment)
    .with(Labels.type, 'database')
    .with(Labels.databaseEngine, db.engine)
    .with(Labels.databaseVersion, db.version);
}

export function forService(environment: string, service: ServiceName): LabelPredicate {
  return forEnvironment(environment).with(Labels.type, 'service').with(Labels.service, service);
}

export function forSite(environment: string, hostname: string): LabelPredicate {
  return forEnvironment(environment).with(Labels.type, 'site').with(Labels.host, hostname);
}

export function databaseCompatibility(engine: DatabaseEngine): string {
  return engine === 'postgres' ? 'postgres' : 'mysql';
}
