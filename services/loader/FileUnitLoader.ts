import * as path from 'path';
import yaml from 'js-yaml';
import { ConstructionError, UnitNotFoundError } from '@core/errors';
import { DEFAULT_CONFIG } from '@core/config/types';
import { loaderLogger as logger } from '@core/utils/logger';
import type { UnitLoader } from '@interpreter/loader/UnitLoader';
import { validateUnitName } from '@interpreter/loader/UnitArena';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';

/**
 * Parse YAML or JSON unit content. YAML uses the core schema, so dates and
 * other non-native tags stay strings or are rejected.
 */
export function parseUnitContent(text: string, filePath: string): unknown {
  try {
    if (path.extname(filePath) === '.json') {
      return JSON.parse(text);
    }
    return yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: filePath }) ?? null;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConstructionError(`Cannot parse ${filePath}: ${message}`, { cause: error });
  }
}

/**
 * Loads units from files under a base directory: unit `models/resnet` is
 * `<base>/models/resnet.yaml` (or `.yml`, `.json`, in the configured order).
 */
export class FileUnitLoader implements UnitLoader {
  constructor(
    private readonly baseDir: string,
    private readonly fileSystem: IFileSystemService = new NodeFileSystem(),
    private readonly extensions: readonly string[] = DEFAULT_CONFIG.unitExtensions
  ) {}

  candidates(unit: string): string[] {
    validateUnitName(unit);
    const base = path.resolve(this.baseDir, unit);
    if (this.extensions.includes(path.extname(unit))) {
      return [base];
    }
    return this.extensions.map(extension => `${base}${extension}`);
  }

  load(unit: string): unknown {
    const candidates = this.candidates(unit);
    for (const candidate of candidates) {
      if (this.fileSystem.exists(candidate) && !this.fileSystem.isDirectory(candidate)) {
        logger.debug('Reading unit', { unit, file: candidate });
        return parseUnitContent(this.fileSystem.readFile(candidate), candidate);
      }
    }
    throw new UnitNotFoundError(unit, candidates);
  }
}
