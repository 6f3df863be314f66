import { ConstructionError } from '@core/errors';
import { buildNode } from '@core/tree';
import type { Node } from '@core/tree';
import { loaderLogger as logger } from '@core/utils/logger';
import type { UnitLoader } from './UnitLoader';

const UNIT_NAME_PATTERN = /^[\w.-]+(?:\/[\w.-]+)*$/;

export function validateUnitName(unit: string): string {
  if (!UNIT_NAME_PATTERN.test(unit) || unit.split('/').some(part => part === '.' || part === '..')) {
    throw new ConstructionError(`Invalid unit name '${unit}'`);
  }
  return unit;
}

/**
 * Loads each unit once and hands out independent copies of it.
 */
export class UnitArena {
  private readonly templates = new Map<string, Node>();

  constructor(private readonly loader?: UnitLoader) {}

  get loaded(): string[] {
    return [...this.templates.keys()];
  }

  instantiate(unit: string): Node {
    validateUnitName(unit);
    let template = this.templates.get(unit);
    if (!template) {
      if (!this.loader) {
        throw new ConstructionError(`Cannot load unit '${unit}': no unit loader configured`);
      }
      template = buildNode(this.loader.load(unit), unit);
      this.templates.set(unit, template);
      logger.debug('Loaded unit', { unit });
    }
    const instance = template.copy();
    instance.unitName = unit;
    return instance;
  }
}
