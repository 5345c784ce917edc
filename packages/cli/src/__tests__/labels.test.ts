import { describe, it, expect } from 'vitest';
import {
  LabelPredicate,
  Labels,
  databaseCompatibility,
  forDatabase,
  forEnvironment,
  forProxy,
  forService,
  forSite,
} from '../labels';

describe('LabelPredicate', () => {
  it('should return a new predicate from with', () => {
    const base = forEnvironment('dev');
    const site = base.with(Labels.type, 'site');

    expect(base.toFilters()).toEqual(['dev.berth.environment=dev']);
    expect(site.toFilters()).toEqual(['dev.berth.environment=dev', 'dev.berth.type=site']);
  });

  it('should not carry labels from one entity to the next', () => {
    const first = forSite('dev', 'a.test');
    const second = forSite('dev', 'b.test');

    expect(first.toLabels()[Labels.host]).toBe('a.test');
    expect(second.toLabels()[Labels.host]).toBe('b.test');
  });

  it('should match labels that contain every pair', () => {
    const predicate = LabelPredicate.of({ a: '1', b: '2' });

    expect(predicate.matches({ a: '1', b: '2', c: '3' })).toBe(true);
    expect(predicate.matches({ a: '1' })).toBe(false);
    expect(predicate.matches({ a: '1', b: '3' })).toBe(false);
  });

  it('should match the labels it produces', () => {
    const predicate = forService('dev', 'redis');

    expect(predicate.matches(predicate.toLabels())).toBe(true);
  });
});

describe('entity predicates', () => {
  it('should identify the proxy by environment', () => {
    expect(forProxy('dev').toFilters()).toEqual([
      'dev.berth.environment=dev',
      'dev.berth.proxy=dev',
      'dev.berth.type=proxy',
    ]);
  });

  it('should identify a database by engine and version only', () => {
    expect(forDatabase('dev', { engine: 'postgres', version: '12' }).toFilters()).toEqual([
      'dev.berth.database-engine=postgres',
      'dev.berth.database-version=12',
      'dev.berth.environment=dev',
      'dev.berth.type=database',
    ]);
  });

  it('should keep environments apart', () => {
    const labels = forSite('dev', 'a.test').toLabels();

    expect(forSite('staging', 'a.test').matches(labels)).toBe(false);
  });
});

describe('databaseCompatibility', () => {
  it('should group mariadb with mysql', () => {
    expect(databaseCompatibility('mariadb')).toBe('mysql');
    expect(databaseCompatibility('mysql')).toBe('mysql');
    expect(databaseCompatibility('postgres')).toBe('postgres');
  });
});
