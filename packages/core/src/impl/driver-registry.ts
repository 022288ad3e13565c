/**
 * DriverRegistry: maps a source-type key to the driver that serves it.
 */

import type { DriverDefinition } from '../interfaces/connection';
import { DriverRegistrationError } from '../types/errors';
import { sourceTypeKey, type SourceType } from '../types/source';

export class DriverRegistry {
  private drivers = new Map<string, DriverDefinition>();

  /**
   * @throws DriverRegistrationError if the source type already has a driver
   */
  register(driver: DriverDefinition): this {
    const key = sourceTypeKey(driver.sourceType);
    if (this.drivers.has(key)) {
      throw new DriverRegistrationError(key);
    }
    this.drivers.set(key, driver);
    return this;
  }

  get(sourceType: SourceType): DriverDefinition | undefined {
    return this.drivers.get(sourceTypeKey(sourceType));
  }

  has(sourceType: SourceType): boolean {
    return this.drivers.has(sourceTypeKey(sourceType));
  }

  keys(): string[] {
    return Array.from(this.drivers.keys());
  }
}
