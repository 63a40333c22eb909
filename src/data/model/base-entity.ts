// SPDX-License-Identifier: Apache-2.0

import {DateField, Field} from '../mapper/metadata/property-decorators.js';
import {type ClassConstructor} from '../../business/utils/class-constructor.type.js';
import {type ResourceMapper} from '../mapper/api/resource-mapper.js';
import {type BaseResource} from './base-resource.js';
import {WrongEntityTypeError} from '../mapper/api/wrong-entity-type-error.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {ReflectAssist} from '../../business/utils/reflect-assist.js';

export type EntityClass<T extends BaseEntity = BaseEntity> = ClassConstructor<T>;

/**
 * Base class of persisted domain objects.
 *
 * The identifier is assigned by the persistence layer and the timestamps by the lifecycle hooks, which the persistence
 * layer invokes right before insert and update. None of them is ever written by the resource mapper.
 */
export abstract class BaseEntity {
  @Field({readonly: true})
  public id: number | null = null;

  @DateField({readonly: true})
  public createdAt: Date | null = null;

  @DateField({readonly: true})
  public updatedAt: Date | null = null;

  public getId(): number | null {
    return this.id;
  }

  public getCreatedAt(): Date | null {
    return this.createdAt;
  }

  public getUpdatedAt(): Date | null {
    return this.updatedAt;
  }

  public onPrePersist(): void {
    const now: Date = new Date();
    this.createdAt = now;
    this.updatedAt = now;
  }

  public onPreUpdate(): void {
    this.updatedAt = new Date();
  }

  /**
   * Creates an entity of the called class from a resource, or updates the given one.
   *
   * @example
   * ```typescript
   * const order: OrderEntity = await OrderEntity.create(resource, mapper);
   * ```
   *
   * @param resource - the incoming resource
   * @param mapper - the mapper to populate the entity with
   * @param existingEntity - the entity to update in place
   * @throws WrongEntityTypeError if the resource maps to a different entity class
   */
  public static async create<T extends BaseEntity>(
    this: EntityClass<T>,
    resource: BaseResource,
    mapper: ResourceMapper,
    existingEntity?: T,
  ): Promise<T> {
    const entity: BaseEntity = await mapper.map(resource, {condition: this}, existingEntity);
    if (!(entity instanceof this)) {
      throw new WrongEntityTypeError(
        `Wrong type (${entity.constructor.name} instead of ${this.name}) in entity factory`,
        this.name,
        entity.constructor.name,
      );
    }
    return entity;
  }

  public static isEntityClass(v: unknown): v is EntityClass {
    return typeof v === 'function' && v.prototype instanceof BaseEntity;
  }

  /**
   * The class of the entity. For a proxy this is the proxied class, not the proxy's own subclass.
   */
  public static classOf(entity: BaseEntity): EntityClass {
    const cls: unknown = ReflectAssist.isEntityProxy(entity)
      ? Object.getPrototypeOf(entity.constructor)
      : entity.constructor;
    if (!BaseEntity.isEntityClass(cls)) {
      throw new IllegalArgumentError('entity constructor is not an entity class', entity.constructor.name);
    }
    return cls;
  }
}
