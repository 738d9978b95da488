/**
 * Graph Schema Registry
 *
 * Node labels, relationship types and the hand-declared projection shape of
 * every aggregate kind. The Cypher templates and the in-process test graph
 * are both derived from PROJECTION_SHAPES, so the shape is the one place
 * that says what an aggregate looks like in the graph.
 */

import type { AggregateKind } from '@shared/aggregate-types';

// ============================================================
// NODE LABELS
// ============================================================

export const LABELS = {
  B2C_CUSTOMER: 'B2CCustomer',
  B2B_CUSTOMER: 'B2BCustomer',
  HOUSEHOLD: 'Household',
  VENDOR: 'Vendor',
  B2C_HEALTH_PROFILE: 'B2CHealthProfile',
  B2B_HEALTH_PROFILE: 'B2BHealthProfile',
  HEALTH_CONDITION: 'HealthCondition',
  ALLERGEN: 'Allergen',
  DIETARY_PREFERENCE: 'DietaryPreference',
  HOUSEHOLD_PREFERENCE: 'HouseholdPreference',
  HOUSEHOLD_BUDGET: 'HouseholdBudget',
} as const;

export type Label = (typeof LABELS)[keyof typeof LABELS];

// ============================================================
// RELATIONSHIP TYPES
// ============================================================

export const RELS = {
  BELONGS_TO_HOUSEHOLD: 'BELONGS_TO_HOUSEHOLD',
  BELONGS_TO_VENDOR: 'BELONGS_TO_VENDOR',
  HAS_PROFILE: 'HAS_PROFILE',
  HAS_CONDITION: 'HAS_CONDITION',
  ALLERGIC_TO: 'ALLERGIC_TO',
  FOLLOWS_DIET: 'FOLLOWS_DIET',
  HAS_PREFERENCE: 'HAS_PREFERENCE',
  HAS_BUDGET: 'HAS_BUDGET',
} as const;

export type RelType = (typeof RELS)[keyof typeof RELS];

// ============================================================
// PROJECTION SHAPES
// ============================================================

export type CollectionName = 'conditions' | 'allergens' | 'diets' | 'preferences' | 'budgets';

/**
 * - catalog: shared reference node; attributes merged keep-existing, only
 *   the edge is removed when the association goes away
 * - owned: node belongs to this owner alone; overwritten from the snapshot
 *   and deleted when the snapshot no longer lists it
 */
export type TargetOwnership = 'catalog' | 'owned';

export interface CollectionShape {
  name: CollectionName;
  owner: 'primary' | 'parent';
  rel: RelType;
  targetLabel: Label;
  ownership: TargetOwnership;
}

export interface LinkShape {
  label: Label;
  rel: RelType;
}

export interface ProjectionShape {
  kind: AggregateKind;
  primaryLabel: Label;
  /** Grouping node, upserted keep-existing and linked primary → parent. */
  parent: LinkShape | null;
  /** 1:1 owned profile node. */
  profile: LinkShape | null;
  collections: readonly CollectionShape[];
}

const HEALTH_COLLECTIONS: readonly CollectionShape[] = [
  {
    name: 'conditions',
    owner: 'primary',
    rel: RELS.HAS_CONDITION,
    targetLabel: LABELS.HEALTH_CONDITION,
    ownership: 'catalog',
  },
  {
    name: 'allergens',
    owner: 'primary',
    rel: RELS.ALLERGIC_TO,
    targetLabel: LABELS.ALLERGEN,
    ownership: 'catalog',
  },
  {
    name: 'diets',
    owner: 'primary',
    rel: RELS.FOLLOWS_DIET,
    targetLabel: LABELS.DIETARY_PREFERENCE,
    ownership: 'catalog',
  },
];

function householdCollections(owner: CollectionShape['owner']): readonly CollectionShape[] {
  return [
    {
      name: 'preferences',
      owner,
      rel: RELS.HAS_PREFERENCE,
      targetLabel: LABELS.HOUSEHOLD_PREFERENCE,
      ownership: 'owned',
    },
    {
      name: 'budgets',
      owner,
      rel: RELS.HAS_BUDGET,
      targetLabel: LABELS.HOUSEHOLD_BUDGET,
      ownership: 'owned',
    },
  ];
}

export const PROJECTION_SHAPES: Readonly<Record<AggregateKind, ProjectionShape>> = {
  b2c_customer: {
    kind: 'b2c_customer',
    primaryLabel: LABELS.B2C_CUSTOMER,
    parent: { label: LABELS.HOUSEHOLD, rel: RELS.BELONGS_TO_HOUSEHOLD },
    profile: { label: LABELS.B2C_HEALTH_PROFILE, rel: RELS.HAS_PROFILE },
    collections: [...HEALTH_COLLECTIONS, ...householdCollections('parent')],
  },
  b2b_customer: {
    kind: 'b2b_customer',
    primaryLabel: LABELS.B2B_CUSTOMER,
    parent: { label: LABELS.VENDOR, rel: RELS.BELONGS_TO_VENDOR },
    profile: { label: LABELS.B2B_HEALTH_PROFILE, rel: RELS.HAS_PROFILE },
    collections: HEALTH_COLLECTIONS,
  },
  household: {
    kind: 'household',
    primaryLabel: LABELS.HOUSEHOLD,
    parent: null,
    profile: null,
    collections: householdCollections('primary'),
  },
};

/**
 * Outgoing links whose targets are owned by the primary node and go away
 * with it on a tombstone.
 */
export function ownedLinksOf(shape: ProjectionShape): LinkShape[] {
  const links: LinkShape[] = [];
  if (shape.profile) links.push(shape.profile);
  for (const collection of shape.collections) {
    if (collection.owner === 'primary' && collection.ownership === 'owned') {
      links.push({ label: collection.targetLabel, rel: collection.rel });
    }
  }
  return links;
}

/** Every label that is keyed by `id` somewhere in the projection. */
export function projectedLabels(): Label[] {
  const labels = new Set<Label>();
  for (const shape of Object.values(PROJECTION_SHAPES)) {
    labels.add(shape.primaryLabel);
    if (shape.parent) labels.add(shape.parent.label);
    if (shape.profile) labels.add(shape.profile.label);
    for (const collection of shape.collections) labels.add(collection.targetLabel);
  }
  return Array.from(labels);
}

/**
 * Graph type of properties whose source column is not a float or a string.
 * Keys absent here are bound by their JS type.
 */
export const PROPERTY_TYPES: Readonly<Record<string, 'integer' | 'date'>> = {
  age: 'integer',
  birth_year: 'integer',
  birth_month: 'integer',
  total_members: 'integer',
  priority: 'integer',
  date_of_birth: 'date',
  diagnosis_date: 'date',
  start_date: 'date',
  end_date: 'date',
};
