// SPDX-License-Identifier: Apache-2.0

import {type BaseEntity} from '../../model/base-entity.js';
import {type NormalizationContext} from './mapping-context.js';
import {type NormalizedMap} from './normalized-map.js';

/**
 * Converts entities into the plain structure resources are created from.
 */
export interface Normalizer {
  /**
   * @param entity - the entity (or an entity proxy) to normalize
   * @param context - the resource classes of the ancestors in the current descent
   * @throws UnmappedTypeError if the entity class or a related entity class has no resource class
   * @throws UninitializedEntityError if a proxy cannot be loaded
   */
  normalize(entity: BaseEntity, context?: NormalizationContext): NormalizedMap;
}
