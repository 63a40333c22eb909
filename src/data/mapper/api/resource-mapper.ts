// SPDX-License-Identifier: Apache-2.0

import {type BaseEntity} from '../../model/base-entity.js';
import {type BaseResource} from '../../model/base-resource.js';
import {type MappingContext} from './mapping-context.js';

/**
 * Populates entities from resources.
 */
export interface ResourceMapper {
  /**
   * Maps the resource onto a new entity of the resolved entity class, or onto the given entity.
   *
   * @param resource - the incoming resource
   * @param context - carries the condition used to pick the entity class
   * @param existingEntity - the entity to update in place
   * @throws UnmappedTypeError if a resource class has no entity class
   * @throws RelatedEntityNotFoundError if a referenced entity does not exist
   */
  map(resource: BaseResource, context?: MappingContext, existingEntity?: BaseEntity | null): Promise<BaseEntity>;
}
