// SPDX-License-Identifier: Apache-2.0

import {plainToInstance} from 'class-transformer';
import {Field} from '../mapper/metadata/property-decorators.js';
import {type ClassConstructor} from '../../business/utils/class-constructor.type.js';
import {type NormalizedMap} from '../mapper/api/normalized-map.js';
import {type Normalizer} from '../mapper/api/normalizer.js';
import {type BaseEntity} from './base-entity.js';
import {ObjectMappingError} from '../mapper/api/object-mapping-error.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

export type ResourceClass<T extends BaseResource = BaseResource> = ClassConstructor<T> &
  Pick<typeof BaseResource, 'createFromNormalizedMap' | 'createFromEntity'>;

/**
 * Base class of the transfer objects exchanged at the API boundary.
 *
 * A resource with an identifier represents an existing entity, one without represents a creation request.
 */
export class BaseResource {
  @Field()
  public id?: number | null;

  /**
   * Creates a resource from the structure produced by normalizing an entity.
   *
   * @param map - normalized entity; dates may be given as strings
   * @throws ObjectMappingError if a value cannot be converted
   */
  public static createFromNormalizedMap<T extends BaseResource>(this: ClassConstructor<T>, map: NormalizedMap): T {
    try {
      return plainToInstance(this, map);
    } catch (error) {
      throw new ObjectMappingError(`Error creating resource from normalized map [ cls = '${this.name}' ]`, error);
    }
  }

  public static createFromEntity<T extends BaseResource>(
    this: ClassConstructor<T> & Pick<typeof BaseResource, 'createFromNormalizedMap'>,
    entity: BaseEntity,
    normalizer: Normalizer,
  ): T {
    return this.createFromNormalizedMap(normalizer.normalize(entity));
  }

  public static isResourceClass(v: unknown): v is ResourceClass {
    return typeof v === 'function' && (v === BaseResource || v.prototype instanceof BaseResource);
  }

  public static classOf(resource: BaseResource): ResourceClass {
    const cls: unknown = resource.constructor;
    if (!BaseResource.isResourceClass(cls)) {
      throw new IllegalArgumentError('resource constructor is not a resource class', resource.constructor.name);
    }
    return cls;
  }
}
