// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import {type PropertyDescriptor} from './property-descriptor.js';
import {PropertyKind} from './property-kind.js';
import {UnsupportedOperationError} from '../../../business/errors/unsupported-operation-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

const PROPERTY_METADATA_KEY: symbol = Symbol.for('entity-resource-mapper:properties');

type DescriptorMap = Map<string, PropertyDescriptor>;

/**
 * Registry of the property descriptors recorded by the mapping decorators.
 *
 * Descriptors are stored on the class prototype. Lookups walk the prototype chain so that properties declared on a
 * base class are inherited, and a subclass declaration replaces the inherited one of the same name.
 */
export class PropertyMetadata {
  private constructor() {
    throw new UnsupportedOperationError('utility classes and cannot be instantiated');
  }

  /**
   * Records (or amends) the descriptor of a property. Called by the decorators; later calls for the same property
   * merge into the existing descriptor so decorators may be stacked in any order.
   */
  public static define(prototype: object, propertyKey: string | symbol, update: Partial<PropertyDescriptor>): void {
    if (typeof propertyKey !== 'string') {
      throw new IllegalArgumentError('mapped properties must have string names', propertyKey.toString());
    }

    const descriptors: DescriptorMap = PropertyMetadata.ownDescriptors(prototype) ?? new Map();
    const existing: PropertyDescriptor | undefined = descriptors.get(propertyKey);

    descriptors.set(propertyKey, {
      kind: PropertyKind.SCALAR,
      ignored: false,
      readonly: false,
      ...existing,
      ...update,
      name: propertyKey,
    });
    Reflect.defineMetadata(PROPERTY_METADATA_KEY, descriptors, prototype);
  }

  /**
   * All descriptors of the class, including inherited ones.
   */
  public static describe(cls: Function): PropertyDescriptor[] {
    const merged: DescriptorMap = new Map();
    for (const prototype of PropertyMetadata.prototypeChain(cls)) {
      const own: DescriptorMap | undefined = PropertyMetadata.ownDescriptors(prototype);
      if (own) {
        for (const [name, descriptor] of own) {
          merged.set(name, descriptor);
        }
      }
    }

    return [...merged.values()];
  }

  public static find(cls: Function, name: string): PropertyDescriptor | undefined {
    return PropertyMetadata.describe(cls).find(descriptor => descriptor.name === name);
  }

  private static ownDescriptors(prototype: object): DescriptorMap | undefined {
    const stored: unknown = Reflect.getOwnMetadata(PROPERTY_METADATA_KEY, prototype);
    return stored instanceof Map ? stored : undefined;
  }

  /**
   * Prototypes from the root base class down to the class itself.
   */
  private static prototypeChain(cls: Function): object[] {
    const chain: object[] = [];
    let prototype: unknown = cls.prototype;
    while (typeof prototype === 'object' && prototype !== null && prototype !== Object.prototype) {
      chain.unshift(prototype);
      prototype = Object.getPrototypeOf(prototype);
    }

    return chain;
  }
}
