// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type EntityManager} from '../api/entity-manager.js';
import {BaseEntity, type EntityClass} from '../../model/base-entity.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

/**
 * Keeps entities in process memory. Identifiers are sequential per root entity class, so a subclass shares the
 * identifier space of its base entity.
 */
@injectable()
export class InMemoryEntityManager implements EntityManager {
  private readonly entities: Map<EntityClass, Map<number, BaseEntity>> = new Map();
  private readonly sequences: Map<EntityClass, number> = new Map();

  /**
   * Stores the entity, running the insert hook for new entities and the update hook for known ones.
   */
  public persist<T extends BaseEntity>(entity: T): T {
    const entityClass: EntityClass = BaseEntity.classOf(entity);
    const rootClass: EntityClass = InMemoryEntityManager.rootClass(entityClass);
    const table: Map<number, BaseEntity> = this.table(rootClass);

    const id: number | null = entity.getId();
    if (id !== null && table.get(id) === entity) {
      entity.onPreUpdate();
      return entity;
    }
    if (id !== null) {
      throw new IllegalArgumentError(`${entityClass.name} entity with id ${id} is not managed`, id);
    }

    const nextId: number = (this.sequences.get(rootClass) ?? 0) + 1;
    this.sequences.set(rootClass, nextId);
    entity.onPrePersist();
    entity.id = nextId;
    table.set(nextId, entity);
    return entity;
  }

  public async find<T extends BaseEntity>(entityClass: EntityClass<T>, id: number): Promise<T | null> {
    const entity: BaseEntity | undefined = this.entities.get(InMemoryEntityManager.rootClass(entityClass))?.get(id);
    return entity instanceof entityClass ? entity : null;
  }

  public remove(entity: BaseEntity): void {
    const id: number | null = entity.getId();
    if (id !== null) {
      this.table(InMemoryEntityManager.rootClass(BaseEntity.classOf(entity))).delete(id);
    }
  }

  public clear(): void {
    this.entities.clear();
    this.sequences.clear();
  }

  /**
   * The topmost ancestor of an entity class that still extends BaseEntity.
   */
  private static rootClass(entityClass: EntityClass): EntityClass {
    let root: EntityClass = entityClass;
    let parent: unknown = Object.getPrototypeOf(root);
    while (BaseEntity.isEntityClass(parent)) {
      root = parent;
      parent = Object.getPrototypeOf(parent);
    }
    return root;
  }

  private table(entityClass: EntityClass): Map<number, BaseEntity> {
    let table: Map<number, BaseEntity> | undefined = this.entities.get(entityClass);
    if (!table) {
      table = new Map();
      this.entities.set(entityClass, table);
    }
    return table;
  }
}
