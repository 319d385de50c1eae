/**
 * Device Identity Mapper
 *
 * Assigns local device names to the identifiers reported by the database,
 * in the order they are first seen. Mappings are never dropped or reassigned.
 */

import { deviceName } from './definitions.js';

export class DeviceIdentityMapper {
  private readonly mapping = new Map<string, string>();

  resolve(rawId: string): string {
    const known = this.mapping.get(rawId);
    if (known !== undefined) {
      return known;
    }

    const name = deviceName(this.mapping.size);
    this.mapping.set(rawId, name);
    return name;
  }

  get size(): number {
    return this.mapping.size;
  }

  entries(): Array<[string, string]> {
    return [...this.mapping.entries()];
  }
}
