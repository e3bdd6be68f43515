import { Pool } from "pg";
import { and, eq } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import { integer, pgTable, primaryKey, text } from "drizzle-orm/pg-core";

const extractions = pgTable(
  "extractions",
  {
    sourceKey: text("source_key").notNull(),
    segmentIndex: integer("segment_index").notNull(),
    startMs: integer("start_ms").notNull(),
    endMs: integer("end_ms").notNull(),
    title: text("title").notNull(),
    artist: text("artist").notNull(),
    outputPath: text("output_path").notNull(),
    extractedAt: text("extracted_at").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.sourceKey, table.segmentIndex] }),
  })
);

export type ExtractionRecord = typeof extractions.$inferSelect;

/**
 * Remembers which segments of a source were already written, so an
 * interrupted split can resume without cutting the same tracks again.
 */
export interface SplitHistory {
  getExtraction(sourceKey: string, segmentIndex: number): Promise<ExtractionRecord | null>;
  recordExtraction(record: ExtractionRecord): Promise<void>;
  close(): Promise<void>;
}

async function ensureSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS extractions (
      source_key TEXT NOT NULL,
      segment_index INTEGER NOT NULL,
      start_ms INTEGER NOT NULL,
      end_ms INTEGER NOT NULL,
      title TEXT NOT NULL,
      artist TEXT NOT NULL,
      output_path TEXT NOT NULL,
      extracted_at TEXT NOT NULL,
      PRIMARY KEY (source_key, segment_index)
    );
  `);
}

export class PostgresSplitHistory implements SplitHistory {
  private pool: Pool | null = null;
  private dbInstance: ReturnType<typeof drizzle> | null = null;

  constructor(private readonly connectionString: string) {}

  private async getDb() {
    if (this.dbInstance) {
      return this.dbInstance;
    }

    const pool = new Pool({ connectionString: this.connectionString });
    this.pool = pool;
    await ensureSchema(pool);
    this.dbInstance = drizzle(pool);
    return this.dbInstance;
  }

  async getExtraction(sourceKey: string, segmentIndex: number): Promise<ExtractionRecord | null> {
    const db = await this.getDb();
    const rows: ExtractionRecord[] = await db
      .select()
      .from(extractions)
      .where(and(eq(extractions.sourceKey, sourceKey), eq(extractions.segmentIndex, segmentIndex)))
      .limit(1);

    return rows[0] ?? null;
  }

  async recordExtraction(record: ExtractionRecord): Promise<void> {
    const db = await this.getDb();
    await db
      .insert(extractions)
      .values(record)
      .onConflictDoUpdate({
        target: [extractions.sourceKey, extractions.segmentIndex],
        set: {
          startMs: record.startMs,
          endMs: record.endMs,
          title: record.title,
          artist: record.artist,
          outputPath: record.outputPath,
          extractedAt: record.extractedAt,
        },
      });
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.dbInstance = null;
    }
  }
}
