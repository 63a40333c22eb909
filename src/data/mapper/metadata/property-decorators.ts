// SPDX-License-Identifier: Apache-2.0

import {Exclude, Type} from 'class-transformer';
import {PropertyMetadata} from './property-metadata.js';
import {PropertyKind} from './property-kind.js';
import {type TargetResolver} from './property-descriptor.js';

export interface FieldOptions {
  /** The mapper never writes this property into an entity. */
  readonly readonly?: boolean;
}

export interface CollectionOptions extends FieldOptions {
  /** Method that adds one element, when it does not follow the `add<Singular>` convention. */
  readonly adder?: string;

  /** Method that removes one element, when it does not follow the `remove<Singular>` convention. */
  readonly remover?: string;
}

/**
 * A scalar, enum or embedded value property copied as-is.
 */
export function Field(options: FieldOptions = {}): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    PropertyMetadata.define(target, propertyKey, {kind: PropertyKind.SCALAR, readonly: options.readonly ?? false});
  };
}

/**
 * A date/time property. Normalized entities carry it as an RFC 3339 string which is turned back into a `Date` when
 * the resource is created.
 */
export function DateField(options: FieldOptions = {}): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    Type(() => Date)(target, propertyKey);
    PropertyMetadata.define(target, propertyKey, {kind: PropertyKind.DATE, readonly: options.readonly ?? false});
  };
}

/**
 * A reference to a single related entity (on entities) or resource (on resources).
 *
 * @example
 * ```typescript
 * @Relation(() => CustomerEntity)
 * public customer: CustomerEntity | null = null;
 * ```
 */
export function Relation(target: TargetResolver, options: FieldOptions = {}): PropertyDecorator {
  return (prototype: object, propertyKey: string | symbol): void => {
    Type(target)(prototype, propertyKey);
    PropertyMetadata.define(prototype, propertyKey, {
      kind: PropertyKind.RELATION,
      target,
      readonly: options.readonly ?? false,
    });
  };
}

/**
 * An ordered collection of related entities (on entities) or resources (on resources), all of the same class.
 */
export function Collection(target: TargetResolver, options: CollectionOptions = {}): PropertyDecorator {
  return (prototype: object, propertyKey: string | symbol): void => {
    Type(target)(prototype, propertyKey);
    PropertyMetadata.define(prototype, propertyKey, {
      kind: PropertyKind.COLLECTION,
      target,
      readonly: options.readonly ?? false,
      adder: options.adder,
      remover: options.remover,
    });
  };
}

/**
 * Keeps a property out of normalized output, e.g. secrets and internal bookkeeping.
 */
export function Ignore(): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    Exclude()(target, propertyKey);
    PropertyMetadata.define(target, propertyKey, {ignored: true});
  };
}
