// SPDX-License-Identifier: Apache-2.0

import {type EntityClass} from '../../model/base-entity.js';
import {type ResourceClass} from '../../model/base-resource.js';

/**
 * Disambiguates the entity class of a resource class registered with more than one entity class. Collection
 * elements are looked up with the owning resource class as the condition.
 */
export type MappingCondition = string | EntityClass | ResourceClass;

export interface MappingContext {
  readonly condition?: MappingCondition;
}

export interface NormalizationContext {
  /**
   * Resource classes already emitted by the ancestors of the entity being normalized.
   */
  readonly parentResources?: readonly ResourceClass[];
}
