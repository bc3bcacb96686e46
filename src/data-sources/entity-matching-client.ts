import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { EntityMatchingConfig } from "../core/config.js";
import { upstreamUnavailable } from "../core/errors.js";
import { logDebug, logWarn, getErrorMessage } from "../core/logging.js";
import { CandidateSchema } from "../domain/matching/schemas.js";
import type {
  Candidate,
  CandidateQuery,
  CandidateSearch,
  Profile,
  SearchFilters,
} from "../domain/matching/types.js";

const SEARCH_PATH = "/profiles/search";

const SearchResponse = z.object({
  matches: z.array(CandidateSchema),
});

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

export interface AttributeFilters {
  state?: string;
  applicantTypes?: string[];
  fundingCategories?: string[];
  minAwardAmount?: number;
  maxAwardAmount?: number;
  requiresEssay?: boolean;
}

/**
 * Coarse pre-filters forwarded to the vector index so it spends its result
 * budget on opportunities the profile can plausibly apply to. The full
 * eligibility check still runs locally.
 */
export function buildAttributeFilters(
  profile: Profile,
  filters: SearchFilters,
): AttributeFilters {
  const out: AttributeFilters = {};
  if (profile.state) out.state = profile.state;
  if (profile.applicantTypes.length > 0)
    out.applicantTypes = profile.applicantTypes;
  if (profile.fundingCategories.length > 0)
    out.fundingCategories = profile.fundingCategories;
  if (filters.minAwardAmount !== undefined)
    out.minAwardAmount = filters.minAwardAmount;
  if (filters.maxAwardAmount !== undefined)
    out.maxAwardAmount = filters.maxAwardAmount;
  if (filters.requiresEssay !== undefined)
    out.requiresEssay = filters.requiresEssay;
  return out;
}

export function isRetryableError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  if (error.code === "ERR_CANCELED") return false;
  const status = error.response?.status;
  if (status !== undefined) return RETRYABLE_STATUS.has(status);
  // No response at all: timeout, reset, DNS
  return true;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Client for the hosted entity-matching vector search. Retries 429/5xx and
 * network failures with exponential backoff; everything else fails at once.
 */
export class EntityMatchingClient implements CandidateSearch {
  private http: AxiosInstance;
  private config: EntityMatchingConfig;

  constructor(config: EntityMatchingConfig) {
    if (!config.baseUrl || !config.apiKey) {
      throw new Error("EntityMatchingClient requires baseUrl and apiKey");
    }
    this.config = config;
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        "Ocp-Apim-Subscription-Key": config.apiKey,
        "Content-Type": "application/json",
      },
    });
  }

  async search(query: CandidateQuery, signal?: AbortSignal): Promise<Candidate[]> {
    const body = {
      entityId: query.profile.id,
      minSimilarity: query.minSimilarity,
      limit: query.limit,
      attributeFilters: buildAttributeFilters(query.profile, query.filters),
    };

    const data = await this.postWithRetry(SEARCH_PATH, body, signal);

    const parsed = SearchResponse.safeParse(data);
    if (!parsed.success) {
      throw upstreamUnavailable(
        "Entity matching returned a malformed search response",
        parsed.error,
      );
    }

    logDebug(
      `Entity matching returned ${parsed.data.matches.length} candidates for ${query.profile.id}`,
    );
    return parsed.data.matches;
  }

  private async postWithRetry(
    url: string,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<unknown> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        const response = await this.http.post<unknown>(url, body, { signal });
        return response.data;
      } catch (error: unknown) {
        lastError = error;

        if (
          signal?.aborted ||
          !isRetryableError(error) ||
          attempt === this.config.maxRetries
        ) {
          break;
        }

        const backoffMs = this.config.retryBackoffMs * Math.pow(2, attempt);
        logWarn(
          `Retry ${attempt + 1}/${this.config.maxRetries} for ${url} in ${backoffMs}ms: ${getErrorMessage(error)}`,
        );
        await sleep(backoffMs, signal);
      }
    }

    throw lastError ?? new Error(`Failed to POST ${url}`);
  }
}
