/**
 * Tests for value providers
 */

import { describe, it, expect } from 'vitest';
import { MissingProviderError } from '../errors';
import { column, toColumnDefinition } from '../schema/column';
import { DEFAULT_STRING_LENGTH, ProviderRegistry, defaultProviders } from './providers';
import { UUID_PATTERN } from '../__tests__/fixtures/pipeline.schema';

describe('ProviderRegistry', () => {
  const providers = new ProviderRegistry();

  it('generates bounded alphanumeric strings', () => {
    const value = providers.providerFor('pipeline', toColumnDefinition('name', column.string(12)))();

    expect(value).toMatch(/^[a-zA-Z0-9]{12}$/);
  });

  it('uses the default length for unbounded strings', () => {
    const value = providers.providerFor('pipeline', toColumnDefinition('name', column.string()))();

    expect(typeof value === 'string' && value.length).toBe(DEFAULT_STRING_LENGTH);
  });

  it('generates uuids for string primary keys', () => {
    const value = providers.providerFor('job', toColumnDefinition('id', column.string(8).primaryKey()))();

    expect(value).toMatch(UUID_PATTERN);
  });

  it('generates uuids for uuid columns', () => {
    expect(providers.providerFor('job', toColumnDefinition('ref', column.uuid()))()).toMatch(UUID_PATTERN);
  });

  it('generates integers in range', () => {
    const value = providers.providerFor('job', toColumnDefinition('retries', column.integer()))();

    expect(Number.isInteger(value)).toBe(true);
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThanOrEqual(9999);
  });

  it('generates floats with two fraction digits', () => {
    const value = providers.providerFor('job', toColumnDefinition('cost', column.float()))();

    expect(typeof value).toBe('number');
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThanOrEqual(1000);
    expect(Math.round(Number(value) * 100) / 100).toBe(value);
  });

  it('generates booleans', () => {
    expect(typeof providers.providerFor('job', toColumnDefinition('done', column.boolean()))()).toBe('boolean');
  });

  it('generates timestamps within the current month', () => {
    const before = new Date();
    const value = providers.providerFor('job', toColumnDefinition('created_at', column.timestamp()))();
    const after = new Date();

    expect(value).toBeInstanceOf(Date);
    const time = value instanceof Date ? value.getTime() : NaN;
    expect(time).toBeGreaterThanOrEqual(new Date(before.getFullYear(), before.getMonth(), 1).getTime());
    expect(time).toBeLessThanOrEqual(after.getTime());
  });

  it('picks enum values from the declared set', () => {
    const values = ['PENDING', 'RUNNING', 'DONE'];
    const provide = providers.providerFor('job', toColumnDefinition('status', column.enum(values)));

    for (let i = 0; i < 10; i++) {
      expect(values).toContain(provide());
    }
  });

  it('generates an empty object for json columns', () => {
    const provide = providers.providerFor('pipeline', toColumnDefinition('config', column.json()));

    expect(provide()).toEqual({});
    expect(provide()).not.toBe(provide());
  });

  it('fails for enums without values', () => {
    expect(() => providers.providerFor('job', toColumnDefinition('status', column.enum([])))).toThrow(
      "No value provider for column 'job.status' of type 'enum without values'"
    );
  });

  it('returns a fresh provider on each lookup', () => {
    const definition = toColumnDefinition('ref', column.uuid());

    const first = providers.providerFor('job', definition);
    const second = providers.providerFor('job', definition);

    expect(first()).not.toBe(second());
  });

  describe('registerProvider', () => {
    it('replaces the strategy for a kind', () => {
      const custom = new ProviderRegistry();
      custom.registerProvider('string', (type) => () => `len:${type.length ?? 'none'}`);

      expect(custom.providerFor('job', toColumnDefinition('name', column.string(5)))()).toBe('len:5');
      expect(custom.providerFor('job', toColumnDefinition('name', column.string()))()).toBe('len:none');
    });

    it('does not affect other registries', () => {
      const custom = new ProviderRegistry();
      custom.registerProvider('boolean', () => () => 'yes');

      expect(typeof providers.providerFor('job', toColumnDefinition('done', column.boolean()))()).toBe('boolean');
    });

    it('passes the column to the factory', () => {
      const custom = new ProviderRegistry();
      custom.registerProvider('integer', (_type, col) => () => col.name.length);

      expect(custom.providerFor('job', toColumnDefinition('retries', column.integer()))()).toBe(7);
    });
  });

  it('builds from a custom provider table', () => {
    const custom = new ProviderRegistry({ ...defaultProviders, json: () => () => ({ steps: [] }) });

    expect(custom.providerFor('pipeline', toColumnDefinition('config', column.json()))()).toEqual({ steps: [] });
  });

  it('reports the column in missing provider errors', () => {
    try {
      providers.providerFor('flag', toColumnDefinition('state', column.enum([])));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingProviderError);
      expect(error).toMatchObject({ code: 'MISSING_PROVIDER', entity: 'flag', column: 'state' });
    }
  });
});
