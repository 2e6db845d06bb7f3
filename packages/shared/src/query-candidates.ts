import { normalizeWhitespace } from "./text-utils.js";

export interface CandidateFields {
  geocodeName: string;
  siteName: string;
}

/**
 * A named rewrite step. Each rule sees the trimmed name fields and returns
 * zero or more raw query strings; normalization and de-duplication happen
 * once, after every rule has run.
 */
export interface QueryCandidateRule {
  name: string;
  apply: (fields: CandidateFields) => string[];
}

const STATE_QUALIFIERS = ["DE", "Delaware"] as const;

/**
 * Specific structure names that drag Nominatim towards a single pier or
 * bridge instead of the surrounding place.
 */
const NOISE_TOKENS = [" Pier", " Bridge"] as const;

const withQualifiers = (value: string): string[] =>
  STATE_QUALIFIERS.map((qualifier) => `${value}, ${qualifier}`);

const withoutNoiseToken = (value: string, token: string): string =>
  value.replaceAll(token, "").trim();

const withoutAllNoiseTokens = (value: string): string =>
  NOISE_TOKENS.reduce((current, token) => withoutNoiseToken(current, token), value);

export const CRABBING_CANDIDATE_RULES: readonly QueryCandidateRule[] = [
  {
    name: "geocode-name",
    apply: ({ geocodeName }) => [geocodeName]
  },
  {
    name: "geocode-name-with-state",
    apply: ({ geocodeName }) => withQualifiers(geocodeName)
  },
  {
    name: "site-name-with-state",
    apply: ({ siteName }) => withQualifiers(siteName)
  },
  {
    name: "geocode-name-without-noise",
    apply: ({ geocodeName }) => NOISE_TOKENS.map((token) => withoutNoiseToken(geocodeName, token))
  },
  {
    name: "site-name-without-noise",
    apply: ({ siteName }) => NOISE_TOKENS.map((token) => withoutNoiseToken(siteName, token))
  },
  {
    name: "site-name-without-noise-with-state",
    apply: ({ siteName }) => [`${withoutAllNoiseTokens(siteName)}, DE`]
  }
];

export const CLAMMING_CANDIDATE_RULES: readonly QueryCandidateRule[] = [
  {
    name: "geocode-name-with-state-and-country",
    apply: ({ geocodeName }) => [`${geocodeName}, Delaware, USA`]
  }
];

export const dedupeQueryCandidates = (rawCandidates: readonly string[]): string[] => {
  const seen = new Set<string>();
  const candidates: string[] = [];

  for (const rawCandidate of rawCandidates) {
    const candidate = normalizeWhitespace(rawCandidate);
    if (!candidate || seen.has(candidate)) {
      continue;
    }

    seen.add(candidate);
    candidates.push(candidate);
  }

  return candidates;
};

/**
 * Ordered, de-duplicated query strings to try for one site, most specific
 * first.
 */
export const buildQueryCandidates = (
  geocodeName: string,
  siteName: string,
  rules: readonly QueryCandidateRule[] = CRABBING_CANDIDATE_RULES
): string[] => {
  const fields: CandidateFields = {
    geocodeName: geocodeName.trim(),
    siteName: siteName.trim()
  };

  return dedupeQueryCandidates(rules.flatMap((rule) => rule.apply(fields)));
};
