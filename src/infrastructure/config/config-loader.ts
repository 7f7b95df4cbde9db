import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import { KlogConfigSchema, type KlogConfig } from '@domain/types/config.js';
import { KLOG_ENV, KLOG_PATHS } from '@shared/constants/paths.js';
import { ConfigError, KlogError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export interface ConfigSources {
  /** Explicit --config path; must exist when given */
  configPath?: string;
  /** --repo override, wins over file and environment */
  repo?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

export interface LoadedConfig {
  config: KlogConfig;
  /** File the values came from; null when running on defaults */
  source: string | null;
}

export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/**
 * First existing configuration file in lookup order:
 * explicit path, $KLOG_CONFIG, ./klog.config.json, ~/.config/klog/config.json.
 */
export function resolveConfigPath(sources: ConfigSources = {}): string | null {
  const env = sources.env ?? process.env;
  const home = sources.home ?? homedir();
  const cwd = sources.cwd ?? process.cwd();

  const explicit = sources.configPath ?? env[KLOG_ENV.config];
  if (explicit) {
    const path = resolve(cwd, expandHome(explicit, home));
    if (!existsSync(path)) {
      throw new KlogError(`Configuration file not found: ${path}`);
    }
    return path;
  }

  for (const candidate of [join(cwd, KLOG_PATHS.localConfig), join(home, KLOG_PATHS.userConfig)]) {
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

function readConfigFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(path, [err instanceof Error ? err.message : String(err)]);
  }
}

/**
 * Load and validate the configuration, then apply overrides and expand `~`
 * in path values. Relative paths resolve against the working directory.
 * @throws ConfigError when the file is not valid JSON or fails validation
 */
export function loadConfig(sources: ConfigSources = {}): LoadedConfig {
  const env = sources.env ?? process.env;
  const home = sources.home ?? homedir();
  const cwd = sources.cwd ?? process.cwd();

  const path = resolveConfigPath(sources);
  const raw = path ? readConfigFile(path) : {};

  const result = KlogConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(path ?? '<defaults>', result.error.issues);
  }

  const config = result.data;
  const repo = sources.repo ?? env[KLOG_ENV.repo] ?? config.repo;
  const toAbsolute = (p: string) => {
    const expanded = expandHome(p, home);
    return isAbsolute(expanded) ? expanded : resolve(cwd, expanded);
  };

  logger.debug('Loaded configuration', { source: path ?? 'defaults' });

  return {
    config: {
      ...config,
      repo: toAbsolute(repo),
      ...(config.updateTrigger ? { updateTrigger: toAbsolute(config.updateTrigger) } : {}),
    },
    source: path,
  };
}
