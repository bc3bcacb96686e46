/**
 * Demo: rank the bundled candidate pool for each demo profile and print
 * the results, then repeat one search to show the cache at work.
 * Usage: npx tsx scripts/demo.ts
 */
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CacheStore } from '../src/core/cache-store.js';
import { loadSearchConfig } from '../src/core/config.js';
import { MatchingOrchestrator } from '../src/domain/matching/orchestrator.js';
import { StaticCandidateSearch } from '../src/domain/matching/static-candidate-search.js';
import { ProfileSchema } from '../src/domain/matching/schemas.js';
import { loadCandidatePool } from '../src/server/context.js';
import type { Profile, RankedResultSet } from '../src/domain/matching/types.js';

const dataDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../data');

const profiles = z
  .array(ProfileSchema)
  .parse(JSON.parse(fs.readFileSync(path.join(dataDir, 'demo-profiles.json'), 'utf-8')));
const byId = new Map<string, Profile>(profiles.map((p) => [p.id, p]));

const orchestrator = new MatchingOrchestrator({
  profiles: { getProfile: async (id) => byId.get(id) ?? null },
  search: new StaticCandidateSearch(loadCandidatePool(dataDir)),
  cache: new CacheStore({ maxEntries: 100, defaultAbsoluteExpiryMs: 60_000 }),
  config: loadSearchConfig(),
});

console.log('═══════════════════════════════════════════════════════════');
console.log('  Grant Match Engine Demo');
console.log('  Vector candidates → Eligibility → Scoring → Ranking');
console.log('═══════════════════════════════════════════════════════════\n');

function printResult(label: string, result: RankedResultSet) {
  const m = result.metadata;
  console.log(`┌─ ${label}`);
  console.log(`│  ${result.totalCount} matches (${m.eligibleCount} eligible, ${m.candidatesRetrieved} retrieved)`);
  for (const match of result.matches) {
    const b = match.breakdown;
    const icon = match.meetsAllRequirements ? '✓' : '✗';
    console.log(
      `│  ${icon} ${match.compositeScore.toFixed(3)}  ${match.opportunity.name}  $${match.opportunity.awardAmount.toLocaleString('en-US')}`,
    );
    console.log(
      `│      sem ${b.semantic.toFixed(3)} · award ${b.award.toFixed(3)} · complexity ${b.complexity.toFixed(3)} · deadline ${b.deadlineProximity.toFixed(3)}`,
    );
    for (const reason of match.unmetRequirements) {
      console.log(`│      ! ${reason}`);
    }
  }
  console.log(`│  ${m.searchStrategy}, ${m.processingTimeMs}ms, fromCache=${m.fromCache}`);
  console.log(`└${'─'.repeat(58)}\n`);
}

for (const profile of profiles) {
  const result = await orchestrator.findMatches({ profileId: profile.id, limit: 5 });
  printResult(profile.name ?? profile.id, result);
}

const first = profiles[0];
if (first) {
  const again = await orchestrator.findMatches({ profileId: first.id, limit: 5 });
  printResult(`${first.name ?? first.id} (repeat)`, again);
}
