import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_SAFETY_LIMITS, mergeSafetyLimits, SafetyLimitsOverrideSchema, type SafetyLimits } from '../core/safety.js';
import { isErrno } from '../utils/atomic_write.js';

export const CONFIG_DIR = '.provenant';
export const CONFIG_FILE = 'config.json';

const ConfigFileSchema = z.object({
  paths: z.object({
    home: z.string().min(1).optional(),
    library: z.string().min(1).optional(),
    pipelines: z.array(z.string().min(1)).optional(),
  }).strict().optional(),
  safety: SafetyLimitsOverrideSchema.optional(),
  fabric: z.object({
    binary: z.string().min(1).optional(),
  }).strict().optional(),
  editor: z.object({
    command: z.string().min(1).optional(),
  }).strict().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ProvenantConfig {
  homeDir: string;
  libraryDir: string;
  runsDir: string;
  pipelineDirs: string[];
  safety: SafetyLimits;
  fabricBinary: string;
  editorCommand: string;
  /** Config file that contributed settings, when one was found. */
  configPath?: string;
}

export interface ResolveConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  userHome?: string;
}

function expandHome(value: string, userHome: string): string {
  if (value === '~') return userHome;
  if (value.startsWith('~/')) return path.join(userHome, value.slice(2));
  return value;
}

/** Walk from `cwd` towards the filesystem root looking for `.provenant/config.json`. */
export async function discoverConfigFile(cwd: string): Promise<string | null> {
  let current = path.resolve(cwd);
  while (true) {
    const candidate = path.join(current, CONFIG_DIR, CONFIG_FILE);
    try {
      const stat = await fs.stat(candidate);
      if (stat.isFile()) return candidate;
    } catch (error) {
      if (!isErrno(error, 'ENOENT') && !isErrno(error, 'ENOTDIR')) throw error;
    }
    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export async function readConfigFile(configPath: string): Promise<ConfigFile> {
  let json: unknown;
  try {
    json = JSON.parse(await fs.readFile(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Could not read config ${configPath}: ${error instanceof Error ? error.message : String(error)}`, {
      path: configPath,
    });
  }
  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config ${configPath}`, {
      path: configPath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Settings precedence: environment, then the discovered config file, then
 * defaults. Relative paths in the file resolve against the directory that
 * holds `.provenant/`.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<ProvenantConfig> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;
  const userHome = options.userHome ?? os.homedir();

  const configPath = await discoverConfigFile(cwd);
  const file: ConfigFile = configPath ? await readConfigFile(configPath) : {};
  const projectRoot = configPath ? path.dirname(path.dirname(configPath)) : cwd;
  const fromFile = (value: string): string => path.resolve(projectRoot, expandHome(value, userHome));

  const envHome = env.PROVENANT_HOME?.trim();
  const envLibrary = env.PROVENANT_LIBRARY?.trim();

  const homeDir = envHome
    ? path.resolve(cwd, expandHome(envHome, userHome))
    : file.paths?.home
      ? fromFile(file.paths.home)
      : path.join(userHome, CONFIG_DIR);
  const libraryDir = envLibrary
    ? path.resolve(cwd, expandHome(envLibrary, userHome))
    : file.paths?.library
      ? fromFile(file.paths.library)
      : path.join(homeDir, 'library');

  const pipelineDirs = [
    ...(file.paths?.pipelines ?? []).map(fromFile),
    path.join(cwd, 'pipelines'),
    path.join(homeDir, 'pipelines'),
  ];

  return {
    homeDir,
    libraryDir,
    runsDir: path.join(homeDir, 'runs'),
    pipelineDirs: [...new Set(pipelineDirs)],
    safety: mergeSafetyLimits(DEFAULT_SAFETY_LIMITS, file.safety),
    fabricBinary: env.PROVENANT_FABRIC_BIN?.trim() || file.fabric?.binary || 'fabric',
    editorCommand: env.PROVENANT_EDITOR?.trim() || file.editor?.command || 'code',
    configPath: configPath ?? undefined,
  };
}
