import { Errors } from './errors.js';
import type { ModelSpec, ReasoningEffort } from '../types/index.js';
import type { ModelsResponse } from '../types/openai.js';

/**
 * Base models accepted when ALLOWED_MODELS is not set
 */
export const DEFAULT_ALLOWED_MODELS: readonly string[] = ['gpt-5', 'gpt-5.2', 'gpt-5.3-codex', 'gpt-5.2-codex'];

/**
 * Accepted reasoning suffixes, longest first so "-xhigh" wins over "-high".
 * The two "extra" spellings are input-only aliases of "xhigh".
 */
const EFFORT_SUFFIXES: ReadonlyArray<readonly [string, Exclude<ReasoningEffort, 'none'>]> = [
  ['-extra-high', 'xhigh'],
  ['-extra_high', 'xhigh'],
  ['-xhigh', 'xhigh'],
  ['-high', 'high'],
  ['-medium', 'medium'],
  ['-low', 'low'],
];

/** Suffixes advertised by the model listing, in listing order */
const ADVERTISED_EFFORTS: ReadonlyArray<Exclude<ReasoningEffort, 'none'>> = ['low', 'medium', 'high', 'xhigh'];

/**
 * Parse a comma separated model list.
 * Empty entries are dropped, duplicates keep their first position,
 * and an empty result falls back to the built-in defaults.
 */
export function parseAllowedModels(raw?: string): readonly string[] {
  const configured = (raw ?? '')
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  const source = configured.length > 0 ? configured : DEFAULT_ALLOWED_MODELS;
  return Object.freeze([...new Set(source)]);
}

/**
 * Resolve a client model identifier into a base model and reasoning effort.
 *
 * A suffix is only stripped when what remains is allowlisted, so an allowlist
 * entry that happens to end in a suffix-like token is never split.
 *
 * @throws ApiError model_not_allowed when nothing resolves to the allowlist
 */
export function resolveModel(requested: string, allowlist: readonly string[]): ModelSpec {
  for (const [suffix, effort] of EFFORT_SUFFIXES) {
    if (!requested.endsWith(suffix)) continue;

    const candidate = requested.slice(0, -suffix.length);
    if (candidate.length > 0 && allowlist.includes(candidate)) {
      return { baseModel: candidate, effort };
    }
  }

  if (allowlist.includes(requested)) {
    return { baseModel: requested, effort: 'none' };
  }

  throw Errors.modelNotAllowed(requested, allowlist);
}

/**
 * Every identifier the bridge advertises: each base model followed by its effort variants
 */
export function listAvailableModels(allowlist: readonly string[]): string[] {
  return allowlist.flatMap((base) => [base, ...ADVERTISED_EFFORTS.map((effort) => `${base}-${effort}`)]);
}

/**
 * Wrap the model listing in the OpenAI /v1/models envelope
 */
export function createModelsResponse(allowlist: readonly string[]): ModelsResponse {
  const created = Math.floor(Date.now() / 1000);

  return {
    object: 'list',
    data: listAvailableModels(allowlist).map((id) => ({
      id,
      object: 'model' as const,
      created,
      owned_by: 'openai',
    })),
  };
}
