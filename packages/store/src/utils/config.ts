// memvault configuration
import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../errors.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

const ArchivalStorageSchema = z.object({
  /** Chroma server endpoint, either "host:port" or a full http(s) URL */
  uri: z.string().min(1).optional(),
  /** Local persistent directory; only usable behind a Chroma server */
  path: z.string().min(1).optional(),
});

const StoreConfigSchema = z.object({
  backend: z.enum(['chroma']).default('chroma'),
  archivalStorage: ArchivalStorageSchema.default({}),
  userId: z.string().min(1).default('anonymous'),
  agentId: z.string().min(1).optional(),
  sizePageSize: z.number().int().positive().default(100),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type StoreConfigInput = z.input<typeof StoreConfigSchema>;

function asObject(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) ? { ...value } : {};
}

/**
 * Build a config struct from (in increasing precedence) the first config file
 * found, MEMVAULT_* environment variables and explicit overrides.
 */
export function loadConfig(overrides?: StoreConfigInput): StoreConfig {
  let fileConfig: Record<string, unknown> = {};
  const configPaths = [
    path.resolve('memvault.json'),
    path.resolve('memvault.config.json'),
    path.join(process.env.HOME || '', '.config/memvault/config.json'),
  ];

  for (const p of configPaths) {
    if (!fs.existsSync(p)) continue;
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(p, 'utf-8'));
      if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        fileConfig = { ...parsed };
        log.debug({ path: p }, 'Loaded config file');
        break;
      }
      log.warn({ path: p }, 'Config file is not a JSON object, skipping');
    } catch (e: unknown) {
      log.warn({ path: p, error: e instanceof Error ? e.message : String(e) }, 'Invalid config file, skipping');
    }
  }

  const envOverrides: Record<string, unknown> = {};
  const archival: Record<string, string> = {};
  if (process.env.MEMVAULT_ARCHIVAL_URI) archival.uri = process.env.MEMVAULT_ARCHIVAL_URI;
  if (process.env.MEMVAULT_ARCHIVAL_PATH) archival.path = process.env.MEMVAULT_ARCHIVAL_PATH;
  if (Object.keys(archival).length > 0) envOverrides.archivalStorage = archival;
  if (process.env.MEMVAULT_USER_ID) envOverrides.userId = process.env.MEMVAULT_USER_ID;
  if (process.env.MEMVAULT_AGENT_ID) envOverrides.agentId = process.env.MEMVAULT_AGENT_ID;

  const merged = {
    ...fileConfig,
    ...envOverrides,
    ...overrides,
    archivalStorage: {
      ...asObject(fileConfig.archivalStorage),
      ...asObject(envOverrides.archivalStorage),
      ...overrides?.archivalStorage,
    },
  };
  const result = StoreConfigSchema.safeParse(merged);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid memvault config: ${detail}`);
  }
  return result.data;
}

/**
 * Resolve the Chroma server URL from the archival storage settings.
 * "host:port" becomes http://host:port; http(s) URLs pass through.
 */
export function parseEndpoint(storage: StoreConfig['archivalStorage']): string {
  const uri = storage.uri?.trim();
  if (!uri) {
    if (storage.path) {
      throw new ConfigError(
        `archivalStorage.path (${storage.path}) needs a Chroma server: run \`chroma run --path ${storage.path}\` and set archivalStorage.uri`,
      );
    }
    throw new ConfigError('archivalStorage.uri is required');
  }

  if (/^https?:\/\//.test(uri)) return uri.replace(/\/$/, '');

  const sep = uri.lastIndexOf(':');
  const host = sep > 0 ? uri.slice(0, sep) : '';
  const port = sep > 0 ? uri.slice(sep + 1) : '';
  if (!host || !/^\d+$/.test(port)) {
    throw new ConfigError(`archivalStorage.uri must look like "host:port", got "${uri}"`);
  }
  return `http://${host}:${parseInt(port)}`;
}
