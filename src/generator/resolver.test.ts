/**
 * Tests for relationship resolution
 */

import { describe, it, expect } from 'vitest';
import { belongsTo, column, defineTable, hasMany } from '../schema';
import { localJoinColumns, resolveRelationships } from './resolver';
import { Category, Job, Pipeline, Stage, StagedPipeline } from '../__tests__/fixtures/pipeline.schema';

describe('resolveRelationships', () => {
  it('infers a belongsTo relation from a suffixed foreign key', () => {
    expect(resolveRelationships(Job).inferred).toEqual([
      { name: 'pipeline', type: 'belongsTo', target: 'pipeline', foreignKey: 'pipeline_id', inferred: true },
    ]);
  });

  it('infers nothing for a table without foreign keys', () => {
    expect(resolveRelationships(Pipeline)).toEqual({ coveredColumns: new Set(), inferred: [] });
  });

  it('infers self references', () => {
    expect(resolveRelationships(Category).inferred.map((r) => [r.name, r.target])).toEqual([['parent', 'category']]);
  });

  it('targets the referenced table, not the column prefix', () => {
    const Build = defineTable('build', {
      id: column.uuid().primaryKey(),
      trigger_id: column.uuid().references('pipeline'),
    });

    expect(resolveRelationships(Build).inferred).toEqual([
      { name: 'trigger', type: 'belongsTo', target: 'pipeline', foreignKey: 'trigger_id', inferred: true },
    ]);
  });

  it('skips columns covered by a declared belongsTo', () => {
    const { coveredColumns, inferred } = resolveRelationships(Stage);

    expect([...coveredColumns]).toEqual(['pipeline_ref']);
    expect(inferred).toEqual([]);
  });

  it('treats the primary key as covered by hasMany relations', () => {
    expect([...resolveRelationships(StagedPipeline).coveredColumns]).toEqual(['id']);
  });

  it('ignores foreign keys without the suffix', () => {
    const Stage2 = defineTable('stage', {
      id: column.uuid().primaryKey(),
      pipeline_ref: column.uuid().references('pipeline'),
    });

    expect(resolveRelationships(Stage2).inferred).toEqual([]);
    expect(resolveRelationships(Stage2, '_ref').inferred.map((r) => r.name)).toEqual(['pipeline']);
  });

  it('ignores suffixed columns without a foreign key', () => {
    const Event = defineTable('event', {
      id: column.uuid().primaryKey(),
      external_id: column.string(),
    });

    expect(resolveRelationships(Event).inferred).toEqual([]);
  });

  it('ignores a column named exactly like the suffix', () => {
    const Odd = defineTable('odd', {
      id: column.uuid().primaryKey(),
      _id: column.uuid().references('pipeline'),
    });

    expect(resolveRelationships(Odd).inferred).toEqual([]);
  });

  it('skips names already used by a column or relation', () => {
    const Run = defineTable('run', {
      id: column.uuid().primaryKey(),
      owner: column.string(),
      owner_id: column.uuid().references('user'),
      job_id: column.uuid().references('job'),
      job_ref: column.uuid().references('job'),
    }, {
      relations: { job: belongsTo('job', { foreignKey: 'job_ref' }) },
    });

    expect(resolveRelationships(Run).inferred).toEqual([]);
  });

  it('follows only the first reference of a column', () => {
    const Link = defineTable('link', {
      id: column.uuid().primaryKey(),
      target_id: column.uuid().references('pipeline').references('job'),
    });

    expect(resolveRelationships(Link).inferred.map((r) => r.target)).toEqual(['pipeline']);
  });
});

describe('localJoinColumns', () => {
  it('uses the foreign key for belongsTo', () => {
    expect(localJoinColumns(Stage, Stage.relations[0])).toEqual(['pipeline_ref']);
  });

  it('uses the primary key for hasOne and hasMany', () => {
    const Team = defineTable('team', { key: column.string().primaryKey() }, {
      relations: { members: hasMany('member') },
    });

    expect(localJoinColumns(Team, Team.relations[0])).toEqual(['key']);
  });
});
