import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DEFAULT_CONFIG } from './types';
import type { SolconfConfig, SolconfConfigFile } from './types';
import { ConstructionError } from '@core/errors';
import { createServiceLogger } from '@core/utils/logger';

const logger = createServiceLogger('config');

type FieldKind = 'string' | 'number' | 'boolean' | 'string[]';

const FIELD_KINDS: Record<keyof SolconfConfig, FieldKind> = {
  interpolationPrefix: 'string',
  escapePrefix: 'string',
  maxExpressionLength: 'number',
  unitExtensions: 'string[]',
  failOnUnusedOverrides: 'boolean'
};

function isConfigKey(key: string): key is keyof SolconfConfig {
  return Object.prototype.hasOwnProperty.call(FIELD_KINDS, key);
}

function matchesKind(value: unknown, kind: FieldKind): boolean {
  if (kind === 'string[]') {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
  }
  if (kind === 'number') {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
  }
  return typeof value === kind;
}

/**
 * Check a parsed config object field by field. Unknown keys are ignored.
 */
export function validateConfig(input: unknown, source: string): SolconfConfigFile {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new ConstructionError(`Configuration in ${source} must be an object`);
  }
  const result: SolconfConfigFile = {};
  for (const [key, value] of Object.entries(input)) {
    if (!isConfigKey(key)) {
      logger.debug('Ignoring unknown configuration key', { key, source });
      continue;
    }
    if (!matchesKind(value, FIELD_KINDS[key])) {
      throw new ConstructionError(
        `Configuration field '${key}' in ${source} must be of type ${FIELD_KINDS[key]}`
      );
    }
    Object.assign(result, { [key]: value });
  }
  return result;
}

/**
 * Load solconf configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: SolconfConfig;

  constructor(projectPath?: string, private readonly env: NodeJS.ProcessEnv = process.env) {
    // Global config location: $XDG_CONFIG_HOME/solconf.json, ~/.config/solconf.json by default
    const configHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
    this.globalConfigPath = path.join(configHome, 'solconf.json');

    // Project config location: <project>/solconf.config.json
    this.projectConfigPath = path.join(projectPath ?? process.cwd(), 'solconf.config.json');
  }

  /**
   * Load and merge configurations: defaults, global, project, environment.
   */
  load(): SolconfConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    this.cachedConfig = {
      ...DEFAULT_CONFIG,
      unitExtensions: [...DEFAULT_CONFIG.unitExtensions],
      ...globalConfig,
      ...projectConfig,
      ...this.loadEnvironment()
    };

    return this.cachedConfig;
  }

  /**
   * Load a single config file. Missing or unparsable files count as empty.
   */
  private loadConfigFile(filePath: string): SolconfConfigFile {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      logger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }
    return validateConfig(parsed, filePath);
  }

  private loadEnvironment(): SolconfConfigFile {
    const result: SolconfConfigFile = {};
    const maxLength = this.env.SOLCONF_MAX_EXPRESSION_LENGTH;
    if (maxLength !== undefined) {
      const parsed = Number(maxLength);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConstructionError(
          `SOLCONF_MAX_EXPRESSION_LENGTH must be a positive integer, got '${maxLength}'`
        );
      }
      result.maxExpressionLength = parsed;
    }
    const failOnUnused = this.env.SOLCONF_FAIL_ON_UNUSED_OVERRIDES;
    if (failOnUnused !== undefined) {
      result.failOnUnusedOverrides = failOnUnused === 'true' || failOnUnused === '1';
    }
    return result;
  }
}

/**
 * Defaults merged with an explicit partial, without touching the file system.
 */
export function resolveConfig(partial: SolconfConfigFile = {}): SolconfConfig {
  return {
    ...DEFAULT_CONFIG,
    unitExtensions: [...DEFAULT_CONFIG.unitExtensions],
    ...validateConfig(partial, 'options')
  };
}
