/**
 * Tests for generation sessions
 */

import { describe, it, expect } from 'vitest';
import { faker } from '@faker-js/faker';
import { OverrideTable } from './overrides';
import { ProviderRegistry } from './providers';
import { createSession } from './session';
import { Job, Pipeline, jobSchema, stagedSchema } from '../__tests__/fixtures/pipeline.schema';
import { column, defineSchema, defineTable } from '../schema';

describe('createSession', () => {
  it('generates a job with its pipeline, parent first', () => {
    const session = createSession({
      schema: jobSchema(),
      overrides: { job: { status: 'RUNNING' } },
    });

    const job = session.build('job')();

    expect(job.status).toBe('RUNNING');
    expect(job.pipeline).toBe(session.build('pipeline')());
    expect(job.pipeline_id).toBe(session.generate('pipeline').id);
    expect(session.instances().map(({ entity }) => entity)).toEqual(['pipeline', 'job']);
    expect(session.build('job')()).toBe(job);
  });

  it('accepts entity types as well as table names', () => {
    const session = createSession({ schema: jobSchema() });

    expect(session.generate(Job)).toBe(session.generate('job'));
    expect(session.build(Pipeline).entity).toBe('pipeline');
  });

  it('reports primary keys by table', () => {
    const session = createSession({ schema: jobSchema() });

    const job = session.generate('job');

    expect(session.primaryKeys()).toEqual({
      pipeline: session.generate('pipeline').id,
      job: job.id,
    });
  });

  it('returns empty results before anything is generated', () => {
    const session = createSession({ schema: jobSchema() });

    expect(session.instances()).toEqual([]);
    expect(session.primaryKeys()).toEqual({});
  });

  describe('overrides option', () => {
    it('merges an array of sources, later sources winning', () => {
      const session = createSession({
        schema: jobSchema(),
        overrides: [
          { job: { status: 'DONE', retries: 1 } },
          { job: { status: 'PENDING' } },
        ],
      });

      const job = session.generate('job');

      expect(job.status).toBe('PENDING');
      expect(job.retries).toBe(1);
    });

    it('accepts a prepared override table', () => {
      const overrides = new OverrideTable({ pipeline: { name: 'release' } });
      const session = createSession({ schema: jobSchema(), overrides });

      expect(session.generate('pipeline').name).toBe('release');
    });
  });

  it('uses custom providers', () => {
    const providers = new ProviderRegistry();
    providers.registerProvider('integer', () => () => 7);
    const session = createSession({ schema: jobSchema(), providers });

    expect(session.generate('job').retries).toBe(7);
  });

  it('infers relations with a custom foreign key suffix', () => {
    const schema = defineSchema([
      defineTable('owner', { id: column.uuid().primaryKey() }),
      defineTable('repo', {
        id: column.uuid().primaryKey(),
        owner_ref: column.uuid().references('owner'),
      }),
    ]);
    const session = createSession({ schema, foreignKeySuffix: '_ref' });

    const repo = session.generate('repo');

    expect(repo.owner).toBe(session.generate('owner'));
    expect(repo.owner_ref).toBe(session.generate('owner').id);
  });

  describe('reset', () => {
    it('discards instances and factories', () => {
      const session = createSession({ schema: jobSchema() });
      const factory = session.build('job');
      const first = factory();

      session.reset();

      expect(session.instances()).toEqual([]);
      expect(session.build('job')).not.toBe(factory);
      expect(session.generate('job')).not.toBe(first);
    });

    it('keeps inferred relations declared', () => {
      const session = createSession({ schema: jobSchema() });
      session.generate('job');

      session.reset();

      expect(session.schema.entity('job').relations.map((r) => r.name)).toEqual(['pipeline']);
    });

    it('produces the same graph shape after a reset', () => {
      const session = createSession({ schema: stagedSchema() });
      session.generate('pipeline');

      session.reset();
      const pipeline = session.generate('pipeline');

      expect(pipeline.stages).toEqual([session.generate('stage')]);
      expect(session.instances().map(({ entity }) => entity)).toEqual(['pipeline', 'stage']);
    });
  });

  it('keeps sessions independent', () => {
    const schema = jobSchema();
    const first = createSession({ schema });
    const second = createSession({ schema });

    first.generate('job');

    expect(second.instances()).toEqual([]);
    expect(second.schema.entity('job').relations).toEqual([]);
    expect(schema.get('job')?.relations).toEqual([]);
  });

  it('generates the same values for the same faker seed', () => {
    faker.seed(42);
    const first = createSession({ schema: jobSchema() }).generate('job');
    faker.seed(42);
    const second = createSession({ schema: jobSchema() }).generate('job');

    expect(second.id).toBe(first.id);
    expect(second.status).toBe(first.status);
    expect(second.retries).toBe(first.retries);
  });
});
