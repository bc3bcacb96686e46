#!/usr/bin/env npx tsx
/**
 * Load applicant profiles (and optionally opportunities) from JSON into the
 * SQLite store the server reads from.
 *
 * Usage:
 *   npx tsx scripts/seed-profiles.ts [profiles.json] [opportunities.json]
 *
 * Defaults to data/demo-profiles.json and the opportunities embedded in
 * data/candidates.json. Existing records with the same id are replaced.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { loadServerConfig } from "../src/core/config.js";
import { logInfo } from "../src/core/logging.js";
import { ensureSqlJs, SqliteDatabase } from "../src/data-sources/sqlite-adapter.js";
import { ProfileStore } from "../src/data-sources/profile-store.js";
import { OpportunitySchema, ProfileSchema } from "../src/domain/matching/schemas.js";
import { loadCandidatePool } from "../src/server/context.js";

const { dataDir } = loadServerConfig();

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(path.resolve(file), "utf-8"));
}

const profilesFile = process.argv[2] ?? path.join(dataDir, "demo-profiles.json");
const opportunitiesFile = process.argv[3];

const profiles = z.array(ProfileSchema).parse(readJson(profilesFile));
const opportunities = opportunitiesFile
  ? z.array(OpportunitySchema).parse(readJson(opportunitiesFile))
  : loadCandidatePool(dataDir).flatMap((c) => (c.opportunity ? [c.opportunity] : []));

await ensureSqlJs();
const store = new ProfileStore();
store.initialize(SqliteDatabase.open(path.join(dataDir, "matching.db")));

for (const profile of profiles) {
  store.saveProfile(profile);
}
store.saveOpportunities(opportunities);
store.close();

logInfo(
  `Seeded ${profiles.length} profiles and ${opportunities.length} opportunities into ${dataDir}`,
);
