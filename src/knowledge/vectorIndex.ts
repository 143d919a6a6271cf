import { SqlClient } from '../db/sqlClient';
import { CompiledFilter, MetadataCondition, compileFilter } from './filters';

export type Metadata = Record<string, unknown>;

export interface VectorPoint {
  id: string;
  content: string;
  embedding: number[];
  metadata: Metadata;
}

export interface StoredPoint {
  id: string;
  content: string;
  metadata: Metadata;
}

export interface ScoredPoint extends StoredPoint {
  score: number;
}

export interface SearchOptions {
  conditions?: MetadataCondition[];
  limit: number;
  scoreThreshold?: number;
}

export interface ScrollOptions {
  conditions?: MetadataCondition[];
  limit: number;
  offset?: number;
}

interface PointRow {
  id: string;
  content: string;
  metadata: Metadata | null;
}

interface ScoredRow extends PointRow {
  score: number | string;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const partitionIdentifier = (name: string): string => {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid knowledge partition name: ${name}`);
  }
  return `"${name}"`;
};

export const toVectorLiteral = (embedding: number[]): string => `[${embedding.join(',')}]`;

const whereClause = (filter: CompiledFilter, extra: string[] = []): string => {
  const parts = [filter.clause, ...extra].filter((part) => part.length > 0);
  return parts.length > 0 ? `WHERE ${parts.join(' AND ')}` : '';
};

const toStored = (row: PointRow): StoredPoint => ({
  id: row.id,
  content: row.content,
  metadata: row.metadata ?? {}
});

/**
 * Knowledge partitions stored as pgvector tables. Each row carries the chunk
 * text, its embedding and a jsonb metadata payload; similarity is cosine.
 */
export class PgVectorIndex {
  constructor(private readonly sql: SqlClient) {}

  async ensurePartition(name: string, dimensions: number): Promise<void> {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Invalid embedding dimensions: ${dimensions}`);
    }
    const table = partitionIdentifier(name);

    await this.sql.query('CREATE EXTENSION IF NOT EXISTS vector');
    await this.sql.query(`
      CREATE TABLE IF NOT EXISTS ${table} (
        id TEXT PRIMARY KEY,
        content TEXT NOT NULL,
        embedding vector(${dimensions}) NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);
    await this.sql.query(
      `CREATE INDEX IF NOT EXISTS ${name}_embedding_idx ON ${table} USING hnsw (embedding vector_cosine_ops)`
    );
    await this.sql.query(`CREATE INDEX IF NOT EXISTS ${name}_metadata_idx ON ${table} USING gin (metadata)`);
  }

  async search(partition: string, embedding: number[], options: SearchOptions): Promise<ScoredPoint[]> {
    const table = partitionIdentifier(partition);
    const values: unknown[] = [toVectorLiteral(embedding)];
    const filter = compileFilter(options.conditions ?? [], 2);
    values.push(...filter.values);

    const extra: string[] = [];
    if (options.scoreThreshold !== undefined) {
      values.push(options.scoreThreshold);
      extra.push(`1 - (embedding <=> $1::vector) >= $${values.length}`);
    }
    values.push(options.limit);

    const result = await this.sql.query<ScoredRow>(
      `SELECT id, content, metadata, 1 - (embedding <=> $1::vector) AS score
       FROM ${table}
       ${whereClause(filter, extra)}
       ORDER BY embedding <=> $1::vector
       LIMIT $${values.length}`,
      values
    );

    return result.rows.map((row) => ({ ...toStored(row), score: Number(row.score) }));
  }

  /**
   * Metadata-only retrieval in insertion order, without similarity.
   */
  async scroll(partition: string, options: ScrollOptions): Promise<StoredPoint[]> {
    const table = partitionIdentifier(partition);
    const filter = compileFilter(options.conditions ?? [], 1);
    const values = [...filter.values, options.limit, options.offset ?? 0];

    const result = await this.sql.query<PointRow>(
      `SELECT id, content, metadata
       FROM ${table}
       ${whereClause(filter)}
       ORDER BY created_at, id
       LIMIT $${values.length - 1} OFFSET $${values.length}`,
      values
    );

    return result.rows.map(toStored);
  }

  async upsert(partition: string, points: VectorPoint[]): Promise<number> {
    const table = partitionIdentifier(partition);
    for (const point of points) {
      await this.sql.query(
        `INSERT INTO ${table} (id, content, embedding, metadata)
         VALUES ($1, $2, $3::vector, $4::jsonb)
         ON CONFLICT (id) DO UPDATE
         SET content = EXCLUDED.content,
             embedding = EXCLUDED.embedding,
             metadata = EXCLUDED.metadata,
             updated_at = now()`,
        [point.id, point.content, toVectorLiteral(point.embedding), JSON.stringify(point.metadata)]
      );
    }
    return points.length;
  }

  async count(partition: string): Promise<number> {
    const result = await this.sql.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM ${partitionIdentifier(partition)}`
    );
    return Number(result.rows[0]?.count ?? 0);
  }
}
