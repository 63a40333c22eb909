// SPDX-License-Identifier: Apache-2.0

import {type Config} from '../api/config.js';
import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';
import {type ConfigSource} from '../spi/config-source.js';
import {type ObjectMapper} from '../../mapper/api/object-mapper.js';
import {ReflectAssist} from '../../../business/utils/reflect-assist.js';
import {Comparators} from '../../../business/utils/comparators.js';
import {ConfigurationError} from '../api/configuration-error.js';

type CoercedValue = string | number | boolean | object | null;

/**
 * Merges configuration sources. For each key the value of the source with the highest ordinal wins.
 */
export class LayeredConfig implements Config {
  public readonly sources: ConfigSource[];

  public constructor(
    sources: ConfigSource[],
    private readonly mapper: ObjectMapper,
  ) {
    this.sources = [...sources].sort(Comparators.configSource);
  }

  public async load(): Promise<void> {
    for (const source of this.sources) {
      await source.load();
    }
  }

  public asBoolean(key: string): boolean | null {
    const value: CoercedValue = this.coerced(key);
    if (value === null || typeof value === 'boolean') {
      return value;
    } else if (typeof value === 'number') {
      return value !== 0;
    } else if (typeof value === 'string') {
      return value === 'true';
    }

    throw new ConfigurationError('value is not a boolean', undefined, {key});
  }

  public asNumber(key: string): number | null {
    const value: CoercedValue = this.coerced(key);
    if (value === null || typeof value === 'number') {
      return value;
    }

    throw new ConfigurationError('value is not a number', undefined, {key});
  }

  public asString(key: string): string | null {
    return this.properties().get(key) ?? null;
  }

  public asObject<T>(cls: ClassConstructor<T>): T {
    const object: Record<string, unknown> = {};
    for (const [key, value] of this.properties()) {
      object[key] = ReflectAssist.coerce(value);
    }

    try {
      return this.mapper.fromObject(cls, object);
    } catch (error) {
      throw new ConfigurationError('Failed to convert value to object', error, {cls: cls.name});
    }
  }

  public properties(): Map<string, string> {
    const finalMap: Map<string, string> = new Map<string, string>();

    for (const source of this.sources) {
      const sourceProperties: Map<string, string> = source.properties();
      for (const [key, value] of sourceProperties.entries()) {
        finalMap.set(key, value);
      }
    }

    return finalMap;
  }

  private coerced(key: string): CoercedValue {
    const stringValue: string | null = this.asString(key);
    if (stringValue === null || stringValue.trim().length === 0) {
      return null;
    }

    return ReflectAssist.coerce(stringValue);
  }
}
