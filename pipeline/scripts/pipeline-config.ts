import "dotenv/config";
import { z } from "zod";
import {
  DEFAULT_NOMINATIM_BASE_URL,
  DEFAULT_NOMINATIM_USER_AGENT,
  DEFAULT_REQUEST_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS
} from "../services/nominatim-client.js";
import { DEFAULT_GEOCODE_CACHE_PATH } from "../utils/default-cache-paths.js";

// ---------------------------------------------------------------------------
// Environment configuration
// ---------------------------------------------------------------------------

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const pipelineEnvSchema = z.object({
  NOMINATIM_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default(DEFAULT_NOMINATIM_BASE_URL)
  ),
  NOMINATIM_USER_AGENT: z.preprocess(
    blankToUndefined,
    z.string().default(DEFAULT_NOMINATIM_USER_AGENT)
  ),
  GEOCODE_CACHE_PATH: z.preprocess(
    blankToUndefined,
    z.string().default(DEFAULT_GEOCODE_CACHE_PATH)
  ),
  GEOCODE_REQUEST_DELAY_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).default(DEFAULT_REQUEST_DELAY_MS)
  ),
  GEOCODE_REQUEST_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS)
  )
});

export type PipelineConfig = z.infer<typeof pipelineEnvSchema>;

export const parsePipelineConfig = (env: NodeJS.ProcessEnv): PipelineConfig => {
  const parseResult = pipelineEnvSchema.safeParse(env);
  if (!parseResult.success) {
    const details = parseResult.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid pipeline configuration: ${details}`);
  }

  return parseResult.data;
};

export const loadPipelineConfig = (): PipelineConfig => parsePipelineConfig(process.env);
