/**
 * Neo4j Graph Writer
 *
 * Runs the per-kind Cypher templates against Neo4j through the official
 * driver. Every upsert or tombstone is one managed write transaction
 * (`session.executeWrite`), so a failing statement rolls back the whole
 * aggregate and the driver retries transient cluster errors for us.
 *
 * Property values are bound as-is except: Dates become DATETIME, integer
 * columns become INTEGER and calendar-date columns become DATE (see
 * PROPERTY_TYPES). Every other JS number is sent as a float.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type { AggregateKind } from '@shared/aggregate-types';
import { CONSTRAINT_STATEMENTS, TOMBSTONE_TEMPLATES, UPSERT_TEMPLATES } from './cypher-templates';
import { PROJECTION_SHAPES, PROPERTY_TYPES } from './graph-schema';
import type {
  GraphDocument,
  GraphEdgeInput,
  GraphProperties,
  GraphScalar,
  GraphWriter,
} from './graph-writer';
import { createLogger, type Logger } from '../logger';

export type GraphDriver = Pick<Driver, 'session' | 'verifyConnectivity' | 'close'>;

export interface Neo4jConnectionConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

export interface Neo4jGraphWriterOptions {
  database?: string;
  logger?: Logger;
}

type CypherParameters = Record<string, unknown>;

export function createGraphDriver(config: Neo4jConnectionConfig): Driver {
  return neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password));
}

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function bindValue(key: string, value: GraphScalar | null): unknown {
  if (value instanceof Date) {
    return neo4j.types.DateTime.fromStandardDate(value);
  }
  const type = PROPERTY_TYPES[key];
  if (type === 'integer' && typeof value === 'number' && Number.isInteger(value)) {
    return neo4j.int(value);
  }
  if (type === 'date' && typeof value === 'string') {
    // Built from the parts so the local time zone cannot shift the day.
    const match = CALENDAR_DATE.exec(value);
    if (match) {
      return new neo4j.types.Date(Number(match[1]), Number(match[2]), Number(match[3]));
    }
  }
  return value;
}

function bindProperties(properties: GraphProperties): CypherParameters {
  const bound: CypherParameters = {};
  for (const [key, value] of Object.entries(properties)) {
    bound[key] = bindValue(key, value);
  }
  return bound;
}

function bindEdges(edges: readonly GraphEdgeInput[] | undefined): CypherParameters[] {
  return (edges ?? []).map((edge) => ({
    target: bindProperties(edge.target),
    properties: bindProperties(edge.properties),
  }));
}

/**
 * Turn a document into the parameter map of its kind's upsert template.
 * Every collection the shape declares is bound, absent ones as [].
 */
export function bindUpsertParameters(document: GraphDocument): CypherParameters {
  const shape = PROJECTION_SHAPES[document.kind];
  const parameters: CypherParameters = { primary: bindProperties(document.primary) };

  if (shape.parent) {
    if (!document.parent) {
      throw new Error(
        `${document.kind} ${document.primary.id} has no ${shape.parent.label} to link to`
      );
    }
    parameters.parent = bindProperties(document.parent);
  }

  if (shape.profile) {
    parameters.profile = document.profile ? bindProperties(document.profile) : null;
  }

  for (const collection of shape.collections) {
    parameters[collection.name] = bindEdges(document.collections[collection.name]);
  }

  return parameters;
}

export class Neo4jGraphWriter implements GraphWriter {
  private readonly database: string | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly driver: GraphDriver,
    options: Neo4jGraphWriterOptions = {}
  ) {
    this.database = options.database;
    this.logger = options.logger ?? createLogger('GraphWriter');
  }

  async upsertAggregate(document: GraphDocument): Promise<void> {
    await this.runInTransaction(UPSERT_TEMPLATES[document.kind], bindUpsertParameters(document));
  }

  async detachDelete(kind: AggregateKind, id: string): Promise<void> {
    await this.runInTransaction(TOMBSTONE_TEMPLATES[kind], { id });
  }

  /**
   * Unique `id` constraint per projected label. Schema statements cannot
   * share a transaction with each other, so each runs on its own.
   */
  async ensureConstraints(): Promise<void> {
    const session = this.openSession();
    try {
      for (const statement of CONSTRAINT_STATEMENTS) {
        await session.run(statement);
      }
      this.logger.info(`Ensured ${CONSTRAINT_STATEMENTS.length} uniqueness constraints`);
    } finally {
      await session.close();
    }
  }

  async verifyConnectivity(): Promise<void> {
    await this.driver.verifyConnectivity({ database: this.database });
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private openSession() {
    return this.driver.session({
      database: this.database,
      defaultAccessMode: neo4j.session.WRITE,
    });
  }

  private async runInTransaction(statements: readonly string[], parameters: CypherParameters) {
    const session = this.openSession();
    try {
      await session.executeWrite(async (tx) => {
        for (const statement of statements) {
          await tx.run(statement, parameters);
        }
      });
    } finally {
      await session.close();
    }
  }
}
