import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import * as yaml from 'js-yaml';

import { expandDeep, parseConfiguration, type Configuration } from './config.js';
import { isPlainObject } from './utils.js';

export type LayerOrigin = '--config' | 'cwd' | 'home';

export interface ConfigLayer {
  origin: LayerOrigin;
  filePath: string;
  data: Record<string, unknown>;
}

export const CONFIG_BASENAME = '.sandboxed-agent';
const CONFIG_EXTENSIONS = ['.yaml', '.yml', '.json'];

/** YAML unless the file ends in .json; an empty file is an empty mapping. */
export function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (e) {
    throw new Error(`Failed to read configuration file ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let loaded: unknown;
  try {
    loaded = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(raw) : yaml.load(raw);
  } catch (e) {
    throw new Error(`Invalid configuration file ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (loaded === undefined || loaded === null) return {};
  if (!isPlainObject(loaded)) {
    throw new Error(`Configuration file ${filePath} must contain a mapping at the top level`);
  }
  return loaded;
}

function findInDirectory(dir: string): string | undefined {
  return CONFIG_EXTENSIONS
    .map((ext) => path.join(dir, `${CONFIG_BASENAME}${ext}`))
    .find((candidate) => fs.existsSync(candidate));
}

export interface DiscoverOptions {
  configPath?: string;
  cwd?: string;
  home?: string;
}

/** Layers in precedence order: --config, then the working directory, then home. */
export function discoverLayers(opts: DiscoverOptions = {}): ConfigLayer[] {
  const layers: ConfigLayer[] = [];
  if (typeof opts.configPath === 'string' && opts.configPath.length > 0) {
    const explicit = path.resolve(opts.configPath);
    if (!fs.existsSync(explicit)) throw new Error(`Configuration file not found: ${opts.configPath}`);
    layers.push({ origin: '--config', filePath: explicit, data: readConfigFile(explicit) });
  }
  const candidates: [LayerOrigin, string | undefined][] = [
    ['cwd', findInDirectory(opts.cwd ?? process.cwd())],
    ['home', findInDirectory(opts.home ?? os.homedir())],
  ];
  candidates.forEach(([origin, filePath]) => {
    if (filePath === undefined) return;
    if (layers.some((layer) => layer.filePath === filePath)) return;
    layers.push({ origin, filePath, data: readConfigFile(filePath) });
  });
  return layers;
}

/** Copy of `base` with keys it leaves unset taken from `fallback`, recursively. */
export function fillMissing(base: Record<string, unknown>, fallback: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  Object.entries(fallback).forEach(([key, value]) => {
    const current = out[key];
    if (current === undefined) {
      out[key] = value;
    } else if (isPlainObject(current) && isPlainObject(value)) {
      out[key] = fillMissing(current, value);
    }
  });
  return out;
}

/** Copy of `base` with every defined value of `overrides` written over it. */
export function applyOverrides(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  Object.entries(overrides).forEach(([key, value]) => {
    if (value === undefined) return;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? applyOverrides(current, value) : value;
  });
  return out;
}

function expandHome(p: string, home: string): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.join(home, p.slice(2));
  return p;
}

export interface ResolveOptions extends DiscoverOptions {
  env?: NodeJS.ProcessEnv;
  /** CLI flags; applied over every file layer. */
  overrides?: Record<string, unknown>;
}

export interface ResolvedConfiguration {
  config: Configuration;
  /** Files that contributed, in precedence order. */
  sources: string[];
}

export function resolveConfiguration(opts: ResolveOptions = {}): ResolvedConfiguration {
  const env = opts.env ?? process.env;
  const home = opts.home ?? os.homedir();
  const layers = discoverLayers({ ...opts, home });
  const merged = layers.reduce<Record<string, unknown>>((acc, layer) => {
    const expanded = expandDeep(layer.data, env, layer.filePath);
    return isPlainObject(expanded) ? fillMissing(acc, expanded) : acc;
  }, {});
  const withOverrides = applyOverrides(merged, opts.overrides ?? {});
  const sources = layers.map((layer) => layer.filePath);
  const config = parseConfiguration(withOverrides, sources.length > 0 ? sources.join(', ') : 'defaults');
  return {
    config: {
      ...config,
      cacheRoot: path.resolve(expandHome(config.cacheRoot, home)),
      backend: {
        ...config.backend,
        ...(config.backend.script !== undefined ? { script: expandHome(config.backend.script, home) } : {}),
      },
      journal: {
        ...config.journal,
        ...(config.journal.dir !== undefined ? { dir: path.resolve(expandHome(config.journal.dir, home)) } : {}),
      },
    },
    sources,
  };
}

/** Journal files live beside the session roots, never inside one. */
export function journalDirectory(config: Configuration): string {
  return config.journal.dir ?? path.join(config.cacheRoot, '.journal');
}
