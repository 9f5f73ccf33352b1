import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { BackendCredentials } from '../types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

/**
 * Expand a leading "~/" to the current user's home directory
 */
export function expandHome(path: string, home: string = homedir()): string {
  return path.startsWith('~/') ? join(home, path.slice(2)) : path;
}

/**
 * Pick backend credentials out of a parsed auth document.
 *
 * Accepted shapes:
 *   { "tokens": { "access_token": "...", "account_id": "..." } }
 *   { "access_token": "...", "account_id": "..." }
 *   { "OPENAI_API_KEY": "..." } or { "api_key": "..." }
 *
 * Account tokens win over an API key when both are present.
 */
export function parseCredentials(document: unknown): BackendCredentials {
  if (!isRecord(document)) {
    throw new Error('Auth file must contain a JSON object');
  }

  const tokenSource = isRecord(document.tokens) ? document.tokens : document;
  const accessToken = nonEmptyString(tokenSource.access_token);
  const accountId = nonEmptyString(tokenSource.account_id);

  if (accessToken && accountId) {
    return { kind: 'chatgpt', accessToken, accountId };
  }

  const apiKey = nonEmptyString(document.OPENAI_API_KEY) ?? nonEmptyString(document.api_key);
  if (apiKey) {
    return { kind: 'api_key', apiKey };
  }

  throw new Error('Auth file has neither access_token + account_id nor an API key');
}

/**
 * Read and parse the auth file once at startup
 */
export async function loadCredentials(authPath: string): Promise<BackendCredentials> {
  const resolved = expandHome(authPath);

  let raw: string;
  try {
    raw = await readFile(resolved, 'utf8');
  } catch (err) {
    throw new Error(`Failed to read auth file at ${resolved}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Failed to parse auth file at ${resolved}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseCredentials(document);
}
