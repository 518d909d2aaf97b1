import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILENAME, DEFAULT_CONFIG } from './defaults.js';
import type { LitdbConfig, PartialConfig } from './types.js';

export type { LitdbConfig, PartialConfig } from './types.js';

const ConfigSchema: z.ZodType<LitdbConfig> = z.object({
  version: z.number().int(),
  database: z.object({
    path: z.string().min(1),
  }),
  embedding: z.object({
    provider: z.literal('openai'),
    model: z.string().min(1),
    dimension: z.number().int().positive({ message: 'dimension must be a positive integer' }),
    maxInputChars: z.number().int().positive(),
    maxBatchSize: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
    retryBaseDelayMs: z.number().int().nonnegative(),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
  }),
  llm: z.object({
    provider: z.enum(['openai-compatible', 'none']),
    baseUrl: z.string().url(),
    model: z.string().min(1),
    apiKey: z.string().optional(),
    timeoutMs: z.number().int().positive(),
  }),
  openalex: z.object({
    baseUrl: z.string().url(),
    email: z.string().optional(),
    apiKey: z.string().optional(),
    perPage: z.number().int().min(1).max(200),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
    retryBaseDelayMs: z.number().int().nonnegative(),
    sinceFilter: z.string().min(1),
  }),
  search: z.object({
    defaultTopK: z.number().int().positive(),
    snippet: z.object({
      open: z.string(),
      close: z.string(),
      ellipsis: z.string(),
      tokens: z.number().int().min(1).max(64),
    }),
  }),
  index: z.object({
    extensions: z.array(
      z.string().regex(/^\.[a-z0-9]+$/, { message: 'extensions must start with a dot and be lowercase' }),
    ),
    skipHidden: z.boolean(),
  }),
});

const FileSchema = z.record(z.unknown());

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 深層合併：partial 覆蓋 base，陣列整個取代 */
function deepMerge(base: Record<string, unknown>, partial: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(partial)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** 環境變數覆蓋 config，優先於檔案與程式碼設定 */
function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  const env: Record<string, Record<string, string>> = {};
  const set = (section: string, key: string, value: string | undefined) => {
    if (value) env[section] = { ...env[section], [key]: value };
  };

  set('embedding', 'baseUrl', process.env.OPENAI_BASE_URL);
  set('llm', 'baseUrl', process.env.OPENAI_BASE_URL);
  set('embedding', 'apiKey', process.env.OPENAI_API_KEY);
  set('llm', 'apiKey', process.env.OPENAI_API_KEY);
  set('openalex', 'email', process.env.OPENALEX_EMAIL);
  set('openalex', 'apiKey', process.env.OPENALEX_API_KEY);

  return deepMerge(config, env);
}

/**
 * 從 startDir 往上找 litdb.json，回傳其所在目錄；找不到時回傳 undefined
 */
export function findConfigRoot(startDir: string): string | undefined {
  let dir = path.resolve(startDir);
  for (;;) {
    if (fs.existsSync(path.join(dir, CONFIG_FILENAME))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * 載入設定：讀取 litdb.json（若存在）並合併到預設值上
 * @param root - 設定根目錄（litdb.json 所在處）
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(root: string, overrides?: PartialConfig): LitdbConfig {
  let fileConfig: Record<string, unknown> = {};

  const configPath = path.join(root, CONFIG_FILENAME);
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf-8');
    fileConfig = FileSchema.parse(JSON.parse(raw));
  }

  // 合併順序：defaults < file config < overrides < 環境變數
  let merged = deepMerge({ ...DEFAULT_CONFIG }, fileConfig);
  if (overrides) {
    merged = deepMerge(merged, { ...overrides });
  }
  merged = applyEnvOverrides(merged);

  return ConfigSchema.parse(merged);
}

/** database.path 為相對路徑時，以設定根目錄為基準 */
export function resolveDatabasePath(root: string, config: LitdbConfig): string {
  return config.database.path === ':memory:'
    ? config.database.path
    : path.resolve(root, config.database.path);
}
