/**
 * Customer Graph Projector
 *
 * Maps a loaded aggregate snapshot to its graph document and hands it to
 * the graph writer as one relationship-replacing upsert.
 *
 * Property rules:
 * - keys are the snake_case column names of the source row
 * - created_at / updated_at become graph datetimes; other dates stay ISO strings
 * - foreign keys (household_id, vendor_id) are expressed as edges, not properties
 * - catalog and parent nodes carry only non-null values (keep-existing merge)
 * - primary and owned nodes carry every column, nulls included (overwrite)
 * - association attributes live on the edge, the catalog node keeps id + name
 */

import type {
  AggregateSnapshot,
  B2bCustomerSnapshot,
  B2cCustomerSnapshot,
  HealthAssociations,
  HouseholdSnapshot,
} from '@shared/aggregate-types';
import { snapshotId } from '@shared/aggregate-types';
import type { CollectionName } from '../graph/graph-schema';
import type {
  GraphDocument,
  GraphEdgeInput,
  GraphProperties,
  GraphScalar,
  GraphWriter,
  NodeProperties,
} from '../graph/graph-writer';
import { createLogger, type Logger } from '../logger';
import { camelToSnake } from '../utils/case-transform';

// ============================================================================
// Property mapping
// ============================================================================

const TIMESTAMP_KEYS = new Set(['created_at', 'updated_at']);

function toGraphValue(key: string, value: unknown): GraphScalar | null {
  if (value === null || value === undefined) return null;
  if (TIMESTAMP_KEYS.has(key) && typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? value : parsed;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return String(value);
}

/** snake_case graph properties of a record, minus the listed snake_case keys. */
export function toGraphProperties(record: object, omit: readonly string[] = []): GraphProperties {
  const properties: GraphProperties = {};
  for (const [key, value] of Object.entries(camelToSnake(record))) {
    if (omit.includes(key)) continue;
    properties[key] = toGraphValue(key, value);
  }
  return properties;
}

function nodeProperties(record: { id: string }, omit: readonly string[] = []): NodeProperties {
  return { ...toGraphProperties(record, omit), id: record.id };
}

/** Drop null values so a keep-existing merge never clears an attribute. */
export function compactProperties(properties: NodeProperties): NodeProperties {
  const compacted: NodeProperties = { id: properties.id };
  for (const [key, value] of Object.entries(properties)) {
    if (value !== null) compacted[key] = value;
  }
  return compacted;
}

function catalogEdge(association: { id: string; name: string | null }): GraphEdgeInput {
  const { id, name, ...attributes } = association;
  return {
    target: compactProperties({ id, name }),
    properties: toGraphProperties(attributes),
  };
}

function ownedEdge(record: { id: string }): GraphEdgeInput {
  return { target: nodeProperties(record), properties: {} };
}

// ============================================================================
// Documents per kind
// ============================================================================

function healthCollections(
  snapshot: HealthAssociations
): Pick<Record<CollectionName, GraphEdgeInput[]>, 'conditions' | 'allergens' | 'diets'> {
  return {
    conditions: snapshot.conditions.map(catalogEdge),
    allergens: snapshot.allergens.map(catalogEdge),
    diets: snapshot.diets.map(catalogEdge),
  };
}

function householdCollections(
  household: Omit<HouseholdSnapshot, 'kind'>
): Pick<Record<CollectionName, GraphEdgeInput[]>, 'preferences' | 'budgets'> {
  return {
    preferences: household.preferences.map(ownedEdge),
    budgets: household.budgets.map(ownedEdge),
  };
}

function householdDocument(snapshot: HouseholdSnapshot): GraphDocument {
  return {
    kind: 'household',
    primary: nodeProperties(snapshot.household),
    parent: null,
    profile: null,
    collections: householdCollections(snapshot),
  };
}

function b2cCustomerDocument(snapshot: B2cCustomerSnapshot): GraphDocument {
  return {
    kind: 'b2c_customer',
    primary: nodeProperties(snapshot.customer, ['household_id']),
    parent: compactProperties(nodeProperties(snapshot.household.household)),
    profile: snapshot.profile ? nodeProperties(snapshot.profile) : null,
    collections: {
      ...healthCollections(snapshot),
      ...householdCollections(snapshot.household),
    },
  };
}

function b2bCustomerDocument(snapshot: B2bCustomerSnapshot): GraphDocument {
  return {
    kind: 'b2b_customer',
    primary: nodeProperties(snapshot.customer, ['vendor_id']),
    parent: compactProperties(nodeProperties(snapshot.vendor)),
    profile: snapshot.profile ? nodeProperties(snapshot.profile) : null,
    collections: healthCollections(snapshot),
  };
}

export function buildGraphDocument(snapshot: AggregateSnapshot): GraphDocument {
  switch (snapshot.kind) {
    case 'household':
      return householdDocument(snapshot);
    case 'b2c_customer':
      return b2cCustomerDocument(snapshot);
    case 'b2b_customer':
      return b2bCustomerDocument(snapshot);
  }
}

function countEdges(document: GraphDocument): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const [name, edges] of Object.entries(document.collections)) {
    counts[name] = edges?.length ?? 0;
  }
  return counts;
}

// ============================================================================
// Projector
// ============================================================================

export class CustomerGraphProjector {
  constructor(
    private readonly graph: GraphWriter,
    private readonly logger: Logger = createLogger('GraphProjector')
  ) {}

  async project(snapshot: AggregateSnapshot): Promise<GraphDocument> {
    const document = buildGraphDocument(snapshot);
    await this.graph.upsertAggregate(document);
    this.logger.info(`Projected ${snapshot.kind} ${snapshotId(snapshot)}`, {
      hasProfile: document.profile !== null,
      ...countEdges(document),
    });
    return document;
  }
}
