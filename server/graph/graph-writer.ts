import type { AggregateKind } from '@shared/aggregate-types';
import type { CollectionName } from './graph-schema';

/** Values a graph property can hold. Dates become graph datetimes. */
export type GraphScalar = string | number | boolean | Date;

export type GraphProperties = Record<string, GraphScalar | null>;

export type NodeProperties = GraphProperties & { id: string };

export interface GraphEdgeInput {
  /**
   * Target node properties. For catalog targets only supplied (non-null)
   * values are present, so an upsert never blanks an attribute.
   */
  target: NodeProperties;
  /** Relationship-scoped attributes, written in full. */
  properties: GraphProperties;
}

/**
 * One aggregate's graph representation, ready to be bound as parameters of
 * the kind's upsert template.
 */
export interface GraphDocument {
  kind: AggregateKind;
  primary: NodeProperties;
  parent: NodeProperties | null;
  profile: NodeProperties | null;
  collections: Partial<Record<CollectionName, readonly GraphEdgeInput[]>>;
}

/**
 * Graph store contract. Each call is one write transaction: either all of
 * it is visible afterwards or none of it is.
 */
export interface GraphWriter {
  /** Idempotent, relationship-replacing upsert of one aggregate. */
  upsertAggregate(document: GraphDocument): Promise<void>;
  /** Remove the primary node, its edges and the nodes it owns. */
  detachDelete(kind: AggregateKind, id: string): Promise<void>;
}
