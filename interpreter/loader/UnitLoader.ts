import { UnitNotFoundError } from '@core/errors';

/**
 * Source of raw content for named configuration units.
 */
export interface UnitLoader {
  /** @throws {UnitNotFoundError} when no unit has that name */
  load(unit: string): unknown;
}

/**
 * Units held in memory, keyed by unit name (`models/resnet`).
 */
export class MemoryUnitLoader implements UnitLoader {
  private readonly units: Map<string, unknown>;

  constructor(units: Record<string, unknown> = {}) {
    this.units = new Map(Object.entries(units));
  }

  add(unit: string, content: unknown): this {
    this.units.set(unit, content);
    return this;
  }

  load(unit: string): unknown {
    if (!this.units.has(unit)) {
      throw new UnitNotFoundError(unit);
    }
    return this.units.get(unit);
  }
}
