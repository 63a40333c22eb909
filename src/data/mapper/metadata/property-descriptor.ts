// SPDX-License-Identifier: Apache-2.0

import {type PropertyKind} from './property-kind.js';

/**
 * Resolves the class on the other end of a relation. A thunk, so that classes may reference each other
 * before both are defined.
 */
export type TargetResolver = () => Function;

/**
 * Describes one mapped property of an entity or resource class.
 */
export interface PropertyDescriptor {
  readonly name: string;

  readonly kind: PropertyKind;

  /**
   * The related class for {@link PropertyKind.RELATION} and the element class for {@link PropertyKind.COLLECTION}.
   */
  readonly target?: TargetResolver;

  /** Excluded from entity normalization. */
  readonly ignored: boolean;

  /** Never written by the resource to entity mapper. */
  readonly readonly: boolean;

  /** Explicit name of the method adding one element to a collection. */
  readonly adder?: string;

  /** Explicit name of the method removing one element from a collection. */
  readonly remover?: string;
}
