import { logInfo } from "../core/logging.js";
import {
  OpportunitySchema,
  ProfileSchema,
} from "../domain/matching/schemas.js";
import type {
  Opportunity,
  OpportunityLookup,
  Profile,
  ProfileRepository,
} from "../domain/matching/types.js";
import { SqliteDatabase, type Row } from "./sqlite-adapter.js";

const MIGRATIONS = [
  `CREATE TABLE profiles (
     id          TEXT PRIMARY KEY,
     name        TEXT,
     data_json   TEXT NOT NULL,
     updated_at  TEXT NOT NULL DEFAULT (datetime('now'))
   );
   CREATE TABLE opportunities (
     id          TEXT PRIMARY KEY,
     name        TEXT NOT NULL,
     data_json   TEXT NOT NULL,
     updated_at  TEXT NOT NULL DEFAULT (datetime('now'))
   );`,
];

/**
 * ProfileStore persists applicant profiles and opportunities in SQLite as
 * validated JSON documents keyed by id. It is the authoritative source of
 * opportunity records for the static candidate pool.
 */
export class ProfileStore implements ProfileRepository, OpportunityLookup {
  private db: SqliteDatabase | null = null;

  initialize(db: SqliteDatabase): void {
    this.db = db;
    const applied = db.migrate(MIGRATIONS);
    db.persist();
    logInfo(
      `ProfileStore initialized (schema v${db.userVersion}, ${applied} migrations applied)`,
    );
  }

  async getProfile(id: string): Promise<Profile | null> {
    const row = this.requireDb()
      .prepare("SELECT data_json FROM profiles WHERE id = ?")
      .get(id);
    return row ? parseProfile(row) : null;
  }

  saveProfile(profile: Profile): void {
    const valid = ProfileSchema.parse(profile);
    const db = this.requireDb();
    db.prepare(
      `INSERT INTO profiles (id, name, data_json, updated_at)
       VALUES (?, ?, ?, datetime('now'))
       ON CONFLICT(id) DO UPDATE SET
         name = excluded.name,
         data_json = excluded.data_json,
         updated_at = excluded.updated_at`,
    ).run(valid.id, valid.name ?? null, JSON.stringify(valid));
    db.persist();
  }

  getOpportunity(id: string): Opportunity | null {
    const row = this.requireDb()
      .prepare("SELECT data_json FROM opportunities WHERE id = ?")
      .get(id);
    return row ? parseOpportunity(row) : null;
  }

  saveOpportunity(opportunity: Opportunity): void {
    this.saveOpportunities([opportunity]);
  }

  /** Upsert a batch in one transaction; one invalid record rejects the batch. */
  saveOpportunities(opportunities: Opportunity[]): void {
    const valid = opportunities.map((o) => OpportunitySchema.parse(o));
    const db = this.requireDb();
    const insert = db.transaction((batch: Opportunity[]) => {
      const stmt = db.prepare(
        `INSERT INTO opportunities (id, name, data_json, updated_at)
         VALUES (?, ?, ?, datetime('now'))
         ON CONFLICT(id) DO UPDATE SET
           name = excluded.name,
           data_json = excluded.data_json,
           updated_at = excluded.updated_at`,
      );
      for (const o of batch) {
        stmt.run(o.id, o.name, JSON.stringify(o));
      }
    });
    insert(valid);
    db.persist();
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private requireDb(): SqliteDatabase {
    if (!this.db) {
      throw new Error("ProfileStore not initialized. Call initialize() first.");
    }
    return this.db;
  }
}

function readJson(row: Row): unknown {
  const raw = row["data_json"];
  if (typeof raw !== "string") {
    throw new Error("Stored record is missing its data_json column");
  }
  return JSON.parse(raw);
}

function parseProfile(row: Row): Profile {
  return ProfileSchema.parse(readJson(row));
}

function parseOpportunity(row: Row): Opportunity {
  return OpportunitySchema.parse(readJson(row));
}
