// SPDX-License-Identifier: Apache-2.0

import {UnsupportedOperationError} from '../errors/unsupported-operation-error.js';
import {type EntityProxy} from '../../data/model/entity-proxy.js';

export class ReflectAssist {
  private constructor() {
    throw new UnsupportedOperationError('utility classes and cannot be instantiated');
  }

  /**
   * TypeScript custom type guard that checks if the provided object is a lazy-loading entity placeholder.
   *
   * @param v - The object to check.
   * @returns true if the object implements EntityProxy, false otherwise.
   */
  public static isEntityProxy(v: object): v is EntityProxy {
    return (
      typeof v === 'object' &&
      !!v &&
      '__load' in v &&
      typeof v.__load === 'function' &&
      '__isInitialized' in v &&
      typeof v.__isInitialized === 'function'
    );
  }

  /**
   * Reads a property by name, invoking getters.
   */
  public static readProperty(v: object, name: string): unknown {
    return Reflect.get(v, name);
  }

  /**
   * Returns the method with the given name when the object (or its prototype chain) declares one.
   */
  public static method(v: object, name: string): ((...arguments_: unknown[]) => unknown) | undefined {
    const candidate: unknown = Reflect.get(v, name);
    if (typeof candidate !== 'function') {
      return undefined;
    }

    return (...arguments_: unknown[]): unknown => Reflect.apply(candidate, v, arguments_);
  }

  public static coerce(v: string): string | number | boolean | object | null {
    try {
      return JSON.parse(v);
    } catch {
      return v;
    }
  }
}
