// SPDX-License-Identifier: Apache-2.0

import {type BaseEntity, type EntityClass} from '../../model/base-entity.js';

/**
 * Identifier lookup of persisted entities, used by the resource mapper to resolve relations.
 */
export interface EntityManager {
  /**
   * @param entityClass - the class of the entity to look up; subclasses match
   * @param id - the entity identifier
   * @returns the entity, or null if there is none with that identifier
   */
  find<T extends BaseEntity>(entityClass: EntityClass<T>, id: number): Promise<T | null>;
}
