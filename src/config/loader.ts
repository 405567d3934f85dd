/**
 * @fileoverview Ranking configuration loading
 *
 * Configuration is read once at startup, validated exhaustively and handed to
 * the ranker as a frozen value. Nothing here defaults silently mid-query: a
 * document that does not validate is rejected as a whole.
 */

import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { ConfigurationError, Errors } from '../core/errors.js';
import { Err, Ok, flatMapResult, mapError, safeSync, unwrap, type Result } from '../core/result.js';
import { getErrorMessage } from '../utils/errors.js';
import { RawRankingConfigSchema, toRankingConfig, type RankingConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'dimension_ranking.yaml';

// Source layout (src/config) and build layout (dist/src/config) both resolve
// to the package's top-level config/ directory through one of these.
const DEFAULT_CONFIG_CANDIDATES = [
  `../../config/${DEFAULT_CONFIG_FILE}`,
  `../../../config/${DEFAULT_CONFIG_FILE}`,
];

function formatZodIssues(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a raw (snake_case) configuration object.
 */
export function parseRankingConfig(raw: unknown): Result<RankingConfig, ConfigurationError> {
  const parsed = RawRankingConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    return Err(Errors.config('ranking', `${issues.length} invalid setting(s): ${issues.join('; ')}`, issues));
  }
  return Ok(toRankingConfig(parsed.data));
}

/**
 * Parse and validate a YAML document.
 */
export function parseRankingConfigYaml(text: string, source = 'inline'): Result<RankingConfig, ConfigurationError> {
  const document = mapError(
    safeSync((): unknown => YAML.parse(text)),
    (error) => Errors.config(source, `invalid YAML: ${error.message}`)
  );
  return flatMapResult(document, (raw) => parseRankingConfig(raw ?? {}));
}

/**
 * Read, parse and validate a YAML configuration file.
 *
 * @throws ConfigurationError when the file is unreadable or invalid
 */
export async function loadRankingConfig(filePath: string): Promise<RankingConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw Errors.config(filePath, `cannot read configuration: ${getErrorMessage(error)}`);
  }
  return unwrap(parseRankingConfigYaml(text, filePath));
}

export async function resolveDefaultConfigPath(): Promise<string> {
  for (const candidate of DEFAULT_CONFIG_CANDIDATES) {
    const resolved = fileURLToPath(new URL(candidate, import.meta.url));
    const exists = await fs.access(resolved).then(() => true, () => false);
    if (exists) return resolved;
  }
  throw Errors.config(DEFAULT_CONFIG_FILE, 'bundled default configuration not found');
}

/**
 * Load the bundled default configuration (general, researcher, business and
 * legal profiles with their detection patterns and filter phrases).
 */
export async function loadDefaultRankingConfig(): Promise<RankingConfig> {
  return loadRankingConfig(await resolveDefaultConfigPath());
}
