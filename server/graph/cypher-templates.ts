/**
 * Cypher Templates
 *
 * Parameterized statements generated once at module load from
 * PROJECTION_SHAPES. Each kind gets one upsert template and one tombstone
 * template; a template is an ordered statement list that the writer runs in
 * a single write transaction.
 *
 * Upsert parameters:
 * - $primary     primary node properties (includes id)
 * - $parent      parent node properties, for kinds with a parent
 * - $profile     profile node properties or null, for kinds with a profile
 * - $<collection> list of { target, properties } per declared collection
 *
 * Tombstone parameters: $id
 */

import type { AggregateKind } from '@shared/aggregate-types';
import {
  PROJECTION_SHAPES,
  ownedLinksOf,
  projectedLabels,
  type CollectionShape,
  type Label,
  type ProjectionShape,
} from './graph-schema';

export type CypherTemplate = readonly string[];

function matchPrimary(shape: ProjectionShape, variable: string): string {
  return `MATCH (${variable}:${shape.primaryLabel} {id: $primary.id})`;
}

function matchOwner(shape: ProjectionShape, collection: CollectionShape): string {
  if (collection.owner === 'primary' || !shape.parent) {
    return matchPrimary(shape, 'o');
  }
  return `MATCH (o:${shape.parent.label} {id: $parent.id})`;
}

function parentStatements(shape: ProjectionShape): string[] {
  if (!shape.parent) return [];
  const { label, rel } = shape.parent;
  return [
    [
      matchPrimary(shape, 'n'),
      `OPTIONAL MATCH (n)-[stale:${rel}]->(other:${label})`,
      'WHERE other.id <> $parent.id',
      'DELETE stale',
      'WITH DISTINCT n',
      `MATCH (p:${label} {id: $parent.id})`,
      `MERGE (n)-[:${rel}]->(p)`,
    ].join('\n'),
  ];
}

function profileStatements(shape: ProjectionShape): string[] {
  if (!shape.profile) return [];
  const { label, rel } = shape.profile;
  return [
    [
      matchPrimary(shape, 'n'),
      `OPTIONAL MATCH (n)-[:${rel}]->(stale:${label})`,
      'WHERE $profile IS NULL OR stale.id <> $profile.id',
      'DETACH DELETE stale',
    ].join('\n'),
    [
      matchPrimary(shape, 'n'),
      'UNWIND CASE WHEN $profile IS NULL THEN [] ELSE [$profile] END AS profile',
      `MERGE (h:${label} {id: profile.id})`,
      'SET h = profile',
      `MERGE (n)-[:${rel}]->(h)`,
    ].join('\n'),
  ];
}

function collectionStatements(shape: ProjectionShape, collection: CollectionShape): string[] {
  const { name, rel, targetLabel, ownership } = collection;
  const owner = matchOwner(shape, collection);
  const statements: string[] = [];

  if (ownership === 'owned') {
    statements.push(
      [
        owner,
        `OPTIONAL MATCH (o)-[:${rel}]->(stale:${targetLabel})`,
        `WHERE NOT stale.id IN [item IN $${name} | item.target.id]`,
        'DETACH DELETE stale',
      ].join('\n')
    );
  }

  statements.push(
    [owner, `OPTIONAL MATCH (o)-[old:${rel}]->(:${targetLabel})`, 'DELETE old'].join('\n'),
    [
      owner,
      `UNWIND $${name} AS item`,
      `MERGE (t:${targetLabel} {id: item.target.id})`,
      ownership === 'catalog' ? 'SET t += item.target' : 'SET t = item.target',
      `MERGE (o)-[r:${rel}]->(t)`,
      'SET r = item.properties',
    ].join('\n')
  );

  return statements;
}

export function buildUpsertTemplate(shape: ProjectionShape): CypherTemplate {
  const statements: string[] = [];

  if (shape.parent) {
    statements.push(`MERGE (p:${shape.parent.label} {id: $parent.id})\nSET p += $parent`);
  }
  statements.push(`MERGE (n:${shape.primaryLabel} {id: $primary.id})\nSET n = $primary`);
  statements.push(...parentStatements(shape));
  statements.push(...profileStatements(shape));
  for (const collection of shape.collections) {
    statements.push(...collectionStatements(shape, collection));
  }

  return statements;
}

export function buildTombstoneTemplate(shape: ProjectionShape): CypherTemplate {
  const statements = ownedLinksOf(shape).map(({ label, rel }) =>
    [
      `MATCH (n:${shape.primaryLabel} {id: $id})`,
      `OPTIONAL MATCH (n)-[:${rel}]->(owned:${label})`,
      'DETACH DELETE owned',
    ].join('\n')
  );
  statements.push(`MATCH (n:${shape.primaryLabel} {id: $id})\nDETACH DELETE n`);
  return statements;
}

function constraintName(label: Label): string {
  return `${label.toLowerCase()}_id_unique`;
}

function mapKinds(build: (shape: ProjectionShape) => CypherTemplate) {
  return {
    b2c_customer: build(PROJECTION_SHAPES.b2c_customer),
    b2b_customer: build(PROJECTION_SHAPES.b2b_customer),
    household: build(PROJECTION_SHAPES.household),
  } satisfies Record<AggregateKind, CypherTemplate>;
}

export const UPSERT_TEMPLATES: Readonly<Record<AggregateKind, CypherTemplate>> =
  mapKinds(buildUpsertTemplate);

export const TOMBSTONE_TEMPLATES: Readonly<Record<AggregateKind, CypherTemplate>> =
  mapKinds(buildTombstoneTemplate);

export const CONSTRAINT_STATEMENTS: CypherTemplate = projectedLabels().map(
  (label) =>
    `CREATE CONSTRAINT ${constraintName(label)} IF NOT EXISTS FOR (n:${label}) REQUIRE n.id IS UNIQUE`
);
