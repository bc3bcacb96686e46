import { argString, type ToolDefinition } from "./tool-registry.js";
import { toCacheStatsResponse, toSearchResponse } from "./response-formatter.js";
import { DEFAULT_LIMIT, MAX_LIMIT } from "../domain/matching/schemas.js";

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "search_matches",
      description:
        "Find grant opportunities for a profile. Candidates come from vector search, are checked against every eligibility rule, scored (semantic similarity, award size, application complexity, deadline proximity) and returned ranked. Identical searches are served from cache for 15 minutes.",
      inputSchema: {
        type: "object",
        properties: {
          profileId: {
            type: "string",
            description: "Id of the stored applicant profile",
          },
          minAwardAmount: {
            type: "number",
            description: "Optional: lowest award amount to include (inclusive)",
          },
          maxAwardAmount: {
            type: "number",
            description: "Optional: highest award amount to include (inclusive)",
          },
          deadlineAfter: {
            type: "string",
            description:
              "Optional: only opportunities due on or after this ISO date",
          },
          deadlineBefore: {
            type: "string",
            description:
              "Optional: only opportunities due on or before this ISO date",
          },
          requiresEssay: {
            type: "boolean",
            description:
              "Optional: true for essay opportunities only, false to exclude them",
          },
          limit: {
            type: "number",
            description: `Page size (default ${DEFAULT_LIMIT}, max ${MAX_LIMIT})`,
          },
          offset: {
            type: "number",
            description: "Results to skip (default 0)",
          },
          minSimilarity: {
            type: "number",
            description: "Semantic similarity floor, 0-1 (default 0.6)",
          },
        },
        required: ["profileId"],
      },
      rateLimited: true,
      handler: async (args, ctx) =>
        toSearchResponse(await ctx.orchestrator.findMatches(args ?? {})),
    },
    {
      name: "get_cache_stats",
      description:
        "Cache hit/miss/eviction counters, current entry count and hit rate.",
      inputSchema: {
        type: "object",
        properties: {},
      },
      handler: async (_args, ctx) =>
        toCacheStatsResponse(ctx.cache.statistics(), ctx.now()),
    },
    {
      name: "clear_cache",
      description:
        'Remove cached entries whose key matches a glob (e.g. "search:matches:p-1:*"). Omit the pattern or pass "*" to clear everything.',
      inputSchema: {
        type: "object",
        properties: {
          pattern: {
            type: "string",
            description: 'Key glob; "*" or omitted clears all',
          },
        },
      },
      handler: async (args, ctx) => {
        const pattern = argString(args, "pattern")?.trim() || "*";
        if (pattern === "*") {
          await ctx.cache.clear();
          return { message: "All cache entries cleared", pattern };
        }
        const removed = await ctx.cache.removeByPattern(pattern);
        return {
          message: `Removed ${removed} cache entries matching pattern`,
          pattern,
          removed,
        };
      },
    },
  ];
}
