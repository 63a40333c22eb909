// SPDX-License-Identifier: Apache-2.0

import {UnsupportedOperationError} from '../../../business/errors/unsupported-operation-error.js';
import {ReflectAssist} from '../../../business/utils/reflect-assist.js';
import {Inflector} from '../../../business/utils/inflector.js';
import {ObjectMappingError} from '../api/object-mapping-error.js';
import {type PropertyDescriptor} from '../metadata/property-descriptor.js';

type CollectionVerb = 'add' | 'remove';

/**
 * Reads and writes entity properties through the entity's accessor methods when it declares them.
 *
 * - `get<Name>()` / `set<Name>(value)`, falling back to the property itself
 * - collections: the descriptor's explicit adder/remover, then `add<Singular>` / `remove<Singular>`,
 *   then `add<Name>` / `remove<Name>`
 */
export class EntityAccessor {
  private constructor() {
    throw new UnsupportedOperationError('utility classes and cannot be instantiated');
  }

  public static get(object: object, property: string): unknown {
    const getter = ReflectAssist.method(object, `get${Inflector.capitalize(property)}`);
    return getter ? getter() : ReflectAssist.readProperty(object, property);
  }

  public static set(object: object, property: string, value: unknown): void {
    const setter = ReflectAssist.method(object, `set${Inflector.capitalize(property)}`);
    if (setter) {
      setter(value);
      return;
    }
    Reflect.set(object, property, value);
  }

  public static add(object: object, descriptor: PropertyDescriptor, value: unknown): void {
    EntityAccessor.collectionMethod(object, 'add', descriptor)(value);
  }

  public static remove(object: object, descriptor: PropertyDescriptor, value: unknown): void {
    EntityAccessor.collectionMethod(object, 'remove', descriptor)(value);
  }

  /**
   * Names of the methods tried, in order, to add to or remove from a collection property.
   */
  public static collectionMethodNames(verb: CollectionVerb, descriptor: PropertyDescriptor): string[] {
    const names: string[] = [];
    const explicit: string | undefined = verb === 'add' ? descriptor.adder : descriptor.remover;
    if (explicit) {
      names.push(explicit);
    }

    const singular: string | null = Inflector.singularize(descriptor.name);
    if (singular) {
      names.push(`${verb}${Inflector.capitalize(singular)}`);
    }
    names.push(`${verb}${Inflector.capitalize(descriptor.name)}`);
    return names;
  }

  private static collectionMethod(
    object: object,
    verb: CollectionVerb,
    descriptor: PropertyDescriptor,
  ): (...arguments_: unknown[]) => unknown {
    const names: string[] = EntityAccessor.collectionMethodNames(verb, descriptor);
    for (const name of names) {
      const method = ReflectAssist.method(object, name);
      if (method) {
        return method;
      }
    }

    throw new ObjectMappingError(
      `Entity has no ${verb} accessor for collection property [ cls = '${object.constructor.name}', property = '${descriptor.name}', tried = '${names.join(', ')}' ]`,
    );
  }
}
