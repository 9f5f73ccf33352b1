import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ALLOWED_MODELS,
  createModelsResponse,
  listAvailableModels,
  parseAllowedModels,
  resolveModel,
} from '../src/lib/model-router.js';
import { ApiError } from '../src/lib/errors.js';
import type { ReasoningEffort } from '../src/types/index.js';

const allowlist = ['gpt-5', 'gpt-5.2', 'gpt-5.2-codex'];

const suffixes: Array<[ReasoningEffort, string]> = [
  ['none', ''],
  ['low', '-low'],
  ['medium', '-medium'],
  ['high', '-high'],
  ['xhigh', '-xhigh'],
];

describe('resolveModel', () => {
  it('round-trips every base model and effort suffix', () => {
    for (const base of allowlist) {
      for (const [effort, suffix] of suffixes) {
        expect(resolveModel(`${base}${suffix}`, allowlist)).toEqual({ baseModel: base, effort });
      }
    }
  });

  it('treats the extra-high spellings as aliases of xhigh', () => {
    const canonical = resolveModel('gpt-5.2-xhigh', allowlist);

    expect(resolveModel('gpt-5.2-extra-high', allowlist)).toEqual(canonical);
    expect(resolveModel('gpt-5.2-extra_high', allowlist)).toEqual(canonical);
    expect(canonical).toEqual({ baseModel: 'gpt-5.2', effort: 'xhigh' });
  });

  it('rejects unknown models with model_not_allowed', () => {
    let caught: unknown;
    try {
      resolveModel('totally-unknown', allowlist);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ApiError);
    expect(caught).toMatchObject({ statusCode: 400, code: 'model_not_allowed', param: 'model' });
  });

  it('rejects a suffix on a model that is not allowlisted', () => {
    expect(() => resolveModel('gpt-4o-high', allowlist)).toThrow("Model 'gpt-4o-high' is not allowed");
  });

  it('compares model names case-sensitively', () => {
    expect(() => resolveModel('GPT-5', allowlist)).toThrow(ApiError);
  });

  it('does not strip a suffix that belongs to the allowlisted name', () => {
    const list = ['turbo-high'];

    expect(resolveModel('turbo-high', list)).toEqual({ baseModel: 'turbo-high', effort: 'none' });
    expect(resolveModel('turbo-high-low', list)).toEqual({ baseModel: 'turbo-high', effort: 'low' });
  });

  it('never resolves a bare suffix to an empty base model', () => {
    expect(() => resolveModel('-high', ['', 'gpt-5'])).toThrow(ApiError);
  });
});

describe('listAvailableModels', () => {
  it('lists each base followed by its effort variants in fixed order', () => {
    expect(listAvailableModels(['gpt-5'])).toEqual([
      'gpt-5',
      'gpt-5-low',
      'gpt-5-medium',
      'gpt-5-high',
      'gpt-5-xhigh',
    ]);
  });

  it('has five entries per base model and never advertises aliases', () => {
    const listed = listAvailableModels(allowlist);

    expect(listed).toHaveLength(5 * allowlist.length);
    expect(listed.filter((id) => id.includes('extra'))).toEqual([]);
  });

  it('keeps the configured base model order', () => {
    const listed = listAvailableModels(['b', 'a']);
    expect(listed[0]).toBe('b');
    expect(listed[5]).toBe('a');
  });

  it('lists identifiers that all resolve', () => {
    for (const id of listAvailableModels(allowlist)) {
      expect(() => resolveModel(id, allowlist)).not.toThrow();
    }
  });
});

describe('parseAllowedModels', () => {
  it('falls back to the defaults when unset or empty', () => {
    expect(parseAllowedModels(undefined)).toEqual(DEFAULT_ALLOWED_MODELS);
    expect(parseAllowedModels(' , ,')).toEqual(DEFAULT_ALLOWED_MODELS);
  });

  it('trims, drops empty entries and deduplicates in order', () => {
    expect(parseAllowedModels(' gpt-5.2 ,, gpt-5 ,gpt-5.2')).toEqual(['gpt-5.2', 'gpt-5']);
  });

  it('returns a frozen list', () => {
    expect(Object.isFrozen(parseAllowedModels('gpt-5'))).toBe(true);
  });
});

describe('createModelsResponse', () => {
  it('wraps the listing in the OpenAI envelope', () => {
    const response = createModelsResponse(['gpt-5']);

    expect(response.object).toBe('list');
    expect(response.data.map((model) => model.id)).toEqual(listAvailableModels(['gpt-5']));
    for (const model of response.data) {
      expect(model.object).toBe('model');
      expect(model.owned_by).toBe('openai');
      expect(typeof model.created).toBe('number');
    }
  });
});
