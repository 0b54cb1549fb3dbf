import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { parseSize } from './size.js';
import type { BuildMode } from '../types.js';

export const RC_FILE = '.kbuildrc.json';

const SizeSchema = z.union([z.number().int().nonnegative(), z.string()]).superRefine((v, ctx) => {
  try {
    parseSize(v);
  } catch (e) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : String(e) });
  }
});

export const KbuildConfigSchema = z
  .object({
    kodi: z.string(),
    out: z.string(),
    name: z.string().min(1),
    version: z.string(),
    description: z.string(),
    creator: z.string(),
    // top-level folders of the Kodi directory that go into the build
    include: z.array(z.string().min(1)),
    exclude: z.array(z.string()),
    skipLarge: SizeSchema,
    mode: z.enum(['personal', 'public']),
    redactionProfile: z.string(),
    buildInfo: z.boolean(),
  })
  .partial()
  .strict();

export type KbuildConfig = z.infer<typeof KbuildConfigSchema>;

export interface ResolvedConfig {
  kodi: string;
  out: string;
  name: string;
  version: string;
  description: string;
  creator?: string;
  include: string[];
  exclude: string[];
  skipLarge: number;
  mode: BuildMode;
  redactionProfile?: string;
  buildInfo: boolean;
}

/** Where Kodi keeps its user directory on this platform. */
export function defaultKodiPath(platform: NodeJS.Platform = process.platform): string {
  const home = os.homedir?.() || process.env.HOME || process.env.USERPROFILE || '';
  if (platform === 'win32') {
    const appData = process.env.APPDATA || path.join(home, 'AppData', 'Roaming');
    return path.join(appData, 'Kodi');
  }
  if (platform === 'darwin') return path.join(home, 'Library', 'Application Support', 'Kodi');
  return path.join(home, '.kodi');
}

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'kodi' | 'creator' | 'redactionProfile'> = {
  out: 'builds',
  name: 'KodiBuild',
  version: '1.0',
  description: 'Kodi build with curated add-ons and settings',
  include: ['userdata', 'addons'],
  exclude: [
    // add-on install packages are downloaded by Kodi on demand
    'addons/packages/*',
    // texture cache, large and machine-specific
    'userdata/Thumbnails/*',
    'userdata/Database/Textures13.db',
    'temp/*',
    'cache/*',
    'logs/*',
    '*.log',
    '*.cache',
    'kodi.old.log',
  ],
  skipLarge: 95 * 1024 * 1024,
  mode: 'personal',
  buildInfo: true,
};

function globalDir(): string {
  const home = os.homedir?.() || process.env.HOME || process.env.USERPROFILE || '';
  return home ? path.join(home, '.kbuild') : '';
}

async function readConfigFile(file: string): Promise<KbuildConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch {
    return {};
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(file, `not valid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  const parsed = KbuildConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(file, parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '));
  }
  // relative paths in a config file are relative to that file
  const dir = path.dirname(file);
  const cfg = { ...parsed.data };
  if (cfg.kodi) cfg.kodi = path.resolve(dir, cfg.kodi);
  if (cfg.out) cfg.out = path.resolve(dir, cfg.out);
  if (cfg.redactionProfile) cfg.redactionProfile = path.resolve(dir, cfg.redactionProfile);
  return cfg;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): KbuildConfig {
  const cfg: KbuildConfig = {};
  if (env.KBUILD_KODI_DIR) cfg.kodi = env.KBUILD_KODI_DIR;
  if (env.KBUILD_OUT_DIR) cfg.out = env.KBUILD_OUT_DIR;
  if (env.KBUILD_SKIP_LARGE) cfg.skipLarge = env.KBUILD_SKIP_LARGE;
  return cfg;
}

/**
 * Merge config layers. Later layers win:
 *  1) ~/.kbuild/config.json
 *  2) <cwd>/.kbuildrc.json
 *  3) KBUILD_* environment variables
 */
export async function loadKbuildConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): Promise<KbuildConfig> {
  const gdir = globalDir();
  const global = gdir ? await readConfigFile(path.join(gdir, 'config.json')) : {};
  const project = await readConfigFile(path.join(cwd, RC_FILE));
  return { ...global, ...project, ...configFromEnv(env) };
}

/** Fill the gaps of a merged config with defaults and normalize sizes and paths. */
export function resolveConfig(cfg: KbuildConfig, cwd: string): ResolvedConfig {
  let skipLarge: number;
  try {
    skipLarge = parseSize(cfg.skipLarge ?? DEFAULT_CONFIG.skipLarge);
  } catch (e) {
    throw new ConfigError('skipLarge', e instanceof Error ? e.message : String(e));
  }
  return {
    kodi: path.resolve(cwd, cfg.kodi ?? defaultKodiPath()),
    out: path.resolve(cwd, cfg.out ?? DEFAULT_CONFIG.out),
    name: cfg.name ?? DEFAULT_CONFIG.name,
    version: cfg.version ?? DEFAULT_CONFIG.version,
    description: cfg.description ?? DEFAULT_CONFIG.description,
    creator: cfg.creator,
    include: cfg.include ?? DEFAULT_CONFIG.include,
    exclude: cfg.exclude ?? DEFAULT_CONFIG.exclude,
    skipLarge,
    mode: cfg.mode ?? DEFAULT_CONFIG.mode,
    redactionProfile: cfg.redactionProfile ? path.resolve(cwd, cfg.redactionProfile) : undefined,
    buildInfo: cfg.buildInfo ?? DEFAULT_CONFIG.buildInfo,
  };
}

export async function writeDefaultKbuildConfig(cwd: string) {
  const configPath = path.join(cwd, RC_FILE);
  const content = JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n';
  await fs.writeFile(configPath, content, 'utf8');
  return configPath;
}

export async function writeDefaultGlobalKbuildConfig() {
  const dir = globalDir();
  if (!dir) throw new Error('Cannot resolve HOME directory for ~/.kbuild');
  await fs.mkdir(dir, { recursive: true });
  const p = path.join(dir, 'config.json');
  const content = JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n';
  await fs.writeFile(p, content, 'utf8');
  return p;
}
