// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ResourceMapper} from '../api/resource-mapper.js';
import {type MappingCondition, type MappingContext} from '../api/mapping-context.js';
import {RelatedEntityNotFoundError} from '../api/related-entity-not-found-error.js';
import {type ClassMapper} from './class-mapper.js';
import {EntityAccessor} from './entity-accessor.js';
import {BaseEntity, type EntityClass} from '../../model/base-entity.js';
import {BaseResource, type ResourceClass} from '../../model/base-resource.js';
import {PropertyMetadata} from '../metadata/property-metadata.js';
import {type PropertyDescriptor} from '../metadata/property-descriptor.js';
import {PropertyKind} from '../metadata/property-kind.js';
import {DateTimes} from '../../../business/utils/date-times.js';
import {type EntityManager} from '../../persistence/api/entity-manager.js';
import {type MapperLogger} from '../../../core/logging/mapper-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';

/**
 * State of one top-level {@link ResourceToEntityMapper.map} call.
 */
interface MappingRun {
  readonly condition?: MappingCondition;

  /** Entities created or being updated for the resources already entered in this run. */
  readonly entered: Map<BaseResource, BaseEntity>;
}

/**
 * Populates new or existing entities from resources.
 *
 * Related resources carrying an identifier are resolved to persisted entities, related resources without one are
 * mapped onto new entities. When an existing entity is updated, properties whose current value equals the incoming
 * one are left untouched so that no mutator runs for them.
 */
@injectable()
export class ResourceToEntityMapper implements ResourceMapper {
  private readonly classMapper: ClassMapper;
  private readonly entityManager: EntityManager;
  private readonly logger: MapperLogger;

  public constructor(
    @inject(InjectTokens.ClassMapper) classMapper?: ClassMapper,
    @inject(InjectTokens.EntityManager) entityManager?: EntityManager,
    @inject(InjectTokens.MapperLogger) logger?: MapperLogger,
  ) {
    this.classMapper = patchInject(classMapper, InjectTokens.ClassMapper, this.constructor.name);
    this.entityManager = patchInject(entityManager, InjectTokens.EntityManager, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.MapperLogger, this.constructor.name);
  }

  public async map(
    resource: BaseResource,
    context: MappingContext = {},
    existingEntity?: BaseEntity | null,
  ): Promise<BaseEntity> {
    return this.mapResource(resource, {condition: context.condition, entered: new Map()}, existingEntity ?? undefined);
  }

  private async mapResource(resource: BaseResource, run: MappingRun, existingEntity?: BaseEntity): Promise<BaseEntity> {
    const entered: BaseEntity | undefined = run.entered.get(resource);
    if (entered) {
      return entered;
    }

    const resourceClass: ResourceClass = BaseResource.classOf(resource);
    const output: BaseEntity = existingEntity ?? new (this.classMapper.byResource(resourceClass, run.condition))();
    run.entered.set(resource, output);

    const entityClass: EntityClass = BaseEntity.classOf(output);
    const updating: boolean = existingEntity !== undefined;
    this.logger.debug(
      `Mapping resource onto entity [ resource = '${resourceClass.name}', entity = '${entityClass.name}', updating = '${updating}' ]`,
    );

    for (const descriptor of PropertyMetadata.describe(resourceClass)) {
      const target: PropertyDescriptor | undefined = PropertyMetadata.find(entityClass, descriptor.name);
      if (!target || target.readonly) {
        continue;
      }

      let value: unknown = this.read(resource, descriptor.name);
      if (value instanceof Date) {
        value = DateTimes.copy(value);
      }

      if (updating && this.compareValues(this.read(output, target.name), value)) {
        continue;
      }

      if (target.kind === PropertyKind.COLLECTION) {
        await this.replaceCollection(output, target, value, resourceClass, run);
        continue;
      }

      if (value instanceof BaseResource) {
        EntityAccessor.set(output, target.name, await this.resolveRelation(value, run));
        continue;
      }

      if (updating || value !== null) {
        EntityAccessor.set(output, target.name, value);
      }
    }

    return output;
  }

  /**
   * Replaces the elements of a collection with the entities of the incoming resources. Persisted elements are looked
   * up with the owning resource class as the condition.
   */
  private async replaceCollection(
    entity: BaseEntity,
    descriptor: PropertyDescriptor,
    value: unknown,
    owner: ResourceClass,
    run: MappingRun,
  ): Promise<void> {
    const current: unknown = EntityAccessor.get(entity, descriptor.name);
    if (Array.isArray(current)) {
      for (const element of [...current]) {
        EntityAccessor.remove(entity, descriptor, element);
      }
    }

    if (!Array.isArray(value) || value.length === 0) {
      return;
    }

    for (const element of value) {
      if (element instanceof BaseResource) {
        EntityAccessor.add(entity, descriptor, await this.resolveRelation(element, run, owner));
      }
    }
  }

  /**
   * The persisted entity of a resource with an identifier, or a new entity mapped from one without.
   *
   * Only the identifier lookup uses the given condition; a new entity is created under the condition of the run.
   */
  private async resolveRelation(
    resource: BaseResource,
    run: MappingRun,
    condition?: MappingCondition,
  ): Promise<BaseEntity> {
    const id: number | null | undefined = resource.id;
    if (id === null || id === undefined) {
      return this.mapResource(resource, run);
    }

    const entityClass: EntityClass = this.classMapper.byResource(BaseResource.classOf(resource), condition);
    const entity: BaseEntity | null = await this.entityManager.find(entityClass, id);
    if (!entity) {
      throw new RelatedEntityNotFoundError(entityClass.name, id);
    }
    return entity;
  }

  /**
   * Whether the incoming value equals the current entity value, in which case the property is not written.
   *
   * Collections are compared position by position, so the same elements in a different order count as a change.
   */
  private compareValues(entityValue: unknown, resourceValue: unknown): boolean {
    if (entityValue === resourceValue) {
      return true;
    }

    if (entityValue instanceof Date && resourceValue instanceof Date) {
      return DateTimes.epochSeconds(entityValue) === DateTimes.epochSeconds(resourceValue);
    }

    if (
      entityValue instanceof BaseEntity &&
      resourceValue instanceof BaseResource &&
      typeof resourceValue.id === 'number'
    ) {
      return this.isSameEntity(entityValue, resourceValue);
    }

    if (!Array.isArray(entityValue)) {
      return false;
    }

    let incoming: unknown[] = [];
    if (Array.isArray(resourceValue)) {
      incoming = resourceValue;
    } else if (resourceValue !== null && resourceValue !== undefined) {
      return false;
    }
    if (incoming.length !== entityValue.length) {
      return false;
    }

    return entityValue.every((element: unknown, index: number): boolean => {
      const resource: unknown = incoming[index];
      return element instanceof BaseEntity && resource instanceof BaseResource && this.isSameEntity(element, resource);
    });
  }

  private isSameEntity(entity: BaseEntity, resource: BaseResource): boolean {
    const entityClass: EntityClass = BaseEntity.classOf(entity);
    return (
      this.classMapper.byResource(BaseResource.classOf(resource), entityClass) === entityClass &&
      entity.getId() === (resource.id ?? null)
    );
  }

  private read(object: BaseEntity | BaseResource, property: string): unknown {
    try {
      return EntityAccessor.get(object, property) ?? null;
    } catch (error) {
      this.logger.debug(
        `Treating unreadable property as null [ cls = '${object.constructor.name}', property = '${property}' ]`,
        error,
      );
      return null;
    }
  }
}
