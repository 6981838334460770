import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import * as yaml from 'yaml';
import { ConfigError } from './errors';

export type IdentifierOptions = {
  prefix: string;
  maxLength: number;
  disambiguate: boolean;
};

export type LayoutOptions = {
  originX: number;
  originY: number;
  spacingX: number;
  spacingY: number;
};

export type GlyphOptions = {
  width: number;
  height: number;
};

export type BundleOptions = {
  nodesFile: string;
  edgesFile: string;
  metaFile: string;
  sampleSize: number;
};

export interface NetworkConfig {
  identifiers: IdentifierOptions;
  layout: LayoutOptions;
  glyph: GlyphOptions;
  bundle: BundleOptions;
}

export const DEFAULT_CONFIG_FILE = 'network.config.yaml';

export const DEFAULT_CONFIG: NetworkConfig = {
  identifiers: { prefix: 'n_', maxLength: 64, disambiguate: false },
  layout: { originX: 100, originY: 100, spacingX: 220, spacingY: 140 },
  glyph: { width: 150, height: 50 },
  bundle: {
    nodesFile: 'nodes.cleaned.csv',
    edgesFile: 'edges.cleaned.csv',
    metaFile: 'bundle.meta.json',
    sampleSize: 10,
  },
};

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(raw: Section, key: string): Section {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isSection(value)) {
    throw new ConfigError(`config: "${key}" must be a mapping`);
  }
  return value;
}

function typeError(path: string, key: string, expected: string, value: unknown): ConfigError {
  return new ConfigError(`config: "${path}.${key}" must be a ${expected}, got ${JSON.stringify(value)}`);
}

function pickString(section: Section, path: string, key: string, fallback: string): string {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') throw typeError(path, key, 'string', value);
  return value;
}

function pickNumber(section: Section, path: string, key: string, fallback: number): number {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) throw typeError(path, key, 'number', value);
  return value;
}

function pickBoolean(section: Section, path: string, key: string, fallback: boolean): boolean {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') throw typeError(path, key, 'boolean', value);
  return value;
}

/**
 * Merge a parsed YAML document over the defaults. Unknown keys are ignored.
 */
export function resolveConfig(raw: unknown): NetworkConfig {
  if (raw === undefined || raw === null) return DEFAULT_CONFIG;
  if (!isSection(raw)) {
    throw new ConfigError('config: top level must be a mapping');
  }

  const ids = readSection(raw, 'identifiers');
  const layout = readSection(raw, 'layout');
  const glyph = readSection(raw, 'glyph');
  const bundle = readSection(raw, 'bundle');
  const d = DEFAULT_CONFIG;

  const config: NetworkConfig = {
    identifiers: {
      prefix: pickString(ids, 'identifiers', 'prefix', d.identifiers.prefix),
      maxLength: pickNumber(ids, 'identifiers', 'maxLength', d.identifiers.maxLength),
      disambiguate: pickBoolean(ids, 'identifiers', 'disambiguate', d.identifiers.disambiguate),
    },
    layout: {
      originX: pickNumber(layout, 'layout', 'originX', d.layout.originX),
      originY: pickNumber(layout, 'layout', 'originY', d.layout.originY),
      spacingX: pickNumber(layout, 'layout', 'spacingX', d.layout.spacingX),
      spacingY: pickNumber(layout, 'layout', 'spacingY', d.layout.spacingY),
    },
    glyph: {
      width: pickNumber(glyph, 'glyph', 'width', d.glyph.width),
      height: pickNumber(glyph, 'glyph', 'height', d.glyph.height),
    },
    bundle: {
      nodesFile: pickString(bundle, 'bundle', 'nodesFile', d.bundle.nodesFile),
      edgesFile: pickString(bundle, 'bundle', 'edgesFile', d.bundle.edgesFile),
      metaFile: pickString(bundle, 'bundle', 'metaFile', d.bundle.metaFile),
      sampleSize: pickNumber(bundle, 'bundle', 'sampleSize', d.bundle.sampleSize),
    },
  };

  if (!Number.isInteger(config.identifiers.maxLength) || config.identifiers.maxLength < 1) {
    throw new ConfigError('config: "identifiers.maxLength" must be a positive integer');
  }
  if (!Number.isInteger(config.bundle.sampleSize) || config.bundle.sampleSize < 0) {
    throw new ConfigError('config: "bundle.sampleSize" must be a non-negative integer');
  }

  return config;
}

export function parseConfig(text: string): NetworkConfig {
  let raw: unknown;
  try {
    raw = yaml.parse(text);
  } catch (err) {
    throw new ConfigError(`config: invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolveConfig(raw);
}

/**
 * Load the config from an explicit path, or from network.config.yaml in the
 * working directory when present. An explicit path that does not exist is an error.
 */
export function loadConfig(configPath?: string): NetworkConfig {
  const path = configPath ?? join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigError(`config file not found: ${configPath}`);
    }
    return DEFAULT_CONFIG;
  }

  const config = parseConfig(readFileSync(path, 'utf-8'));
  console.log(`⚙️  Loaded config from ${path}`);
  return config;
}
