// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type Normalizer} from '../api/normalizer.js';
import {type NormalizationContext} from '../api/mapping-context.js';
import {type NormalizedMap} from '../api/normalized-map.js';
import {UninitializedEntityError} from '../api/uninitialized-entity-error.js';
import {type ClassMapper} from './class-mapper.js';
import {EntityAccessor} from './entity-accessor.js';
import {BaseEntity, type EntityClass} from '../../model/base-entity.js';
import {type BaseResource, type ResourceClass} from '../../model/base-resource.js';
import {PropertyMetadata} from '../metadata/property-metadata.js';
import {type PropertyDescriptor} from '../metadata/property-descriptor.js';
import {PropertyKind} from '../metadata/property-kind.js';
import {ReflectAssist} from '../../../business/utils/reflect-assist.js';
import {DateTimes} from '../../../business/utils/date-times.js';
import {type MapperLogger} from '../../../core/logging/mapper-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';

/**
 * Converts an entity graph into a normalized map. Related entities become resources of the resource class mapped to
 * the declared entity class of the relation.
 *
 * A relation or collection whose resource class was already emitted by an ancestor in the current descent is left
 * out of the output, so cyclic graphs terminate.
 */
@injectable()
export class EntityNormalizer implements Normalizer {
  private readonly classMapper: ClassMapper;
  private readonly logger: MapperLogger;

  public constructor(
    @inject(InjectTokens.ClassMapper) classMapper?: ClassMapper,
    @inject(InjectTokens.MapperLogger) logger?: MapperLogger,
  ) {
    this.classMapper = patchInject(classMapper, InjectTokens.ClassMapper, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.MapperLogger, this.constructor.name);
  }

  public normalize(entity: BaseEntity, context: NormalizationContext = {}): NormalizedMap {
    this.initialize(entity);

    const entityClass: EntityClass = BaseEntity.classOf(entity);
    const visited: readonly ResourceClass[] = [
      ...(context.parentResources ?? []),
      this.classMapper.byEntity(entityClass),
    ];

    const output: NormalizedMap = {};
    for (const descriptor of PropertyMetadata.describe(entityClass)) {
      if (descriptor.ignored) {
        continue;
      }

      const value: unknown = this.read(entity, descriptor);
      if (value === null || value === undefined) {
        continue;
      }

      if (descriptor.kind === PropertyKind.COLLECTION && Array.isArray(value)) {
        const elements: unknown[] | undefined = this.normalizeCollection(descriptor, value, visited);
        if (elements) {
          output[descriptor.name] = elements;
        }
      } else if (value instanceof BaseEntity) {
        const resource: BaseResource | undefined = this.normalizeRelation(descriptor, value, visited);
        if (resource) {
          output[descriptor.name] = resource;
        }
      } else if (value instanceof Date) {
        output[descriptor.name] = DateTimes.toRfc3339(value);
      } else {
        output[descriptor.name] = value;
      }
    }

    return output;
  }

  /**
   * Forces a proxy to load its state. Normalizing a partially loaded entity is never attempted.
   */
  private initialize(entity: BaseEntity): void {
    if (!ReflectAssist.isEntityProxy(entity)) {
      return;
    }

    try {
      entity.__load();
    } catch (error) {
      throw new UninitializedEntityError(
        `Unable to load entity proxy [ cls = '${BaseEntity.classOf(entity).name}' ]`,
        error,
      );
    }

    if (!entity.__isInitialized()) {
      throw new UninitializedEntityError(
        `Entity proxy is still uninitialized after loading [ cls = '${BaseEntity.classOf(entity).name}' ]`,
      );
    }
  }

  private read(entity: BaseEntity, descriptor: PropertyDescriptor): unknown {
    try {
      return EntityAccessor.get(entity, descriptor.name);
    } catch (error) {
      this.logger.debug(
        `Treating unreadable property as null [ cls = '${entity.constructor.name}', property = '${descriptor.name}' ]`,
        error,
      );
      return null;
    }
  }

  private normalizeCollection(
    descriptor: PropertyDescriptor,
    elements: unknown[],
    visited: readonly ResourceClass[],
  ): unknown[] | undefined {
    const entityClass: EntityClass | undefined = this.targetClass(descriptor, elements[0]);
    if (!entityClass) {
      return elements;
    }

    const resourceClass: ResourceClass = this.classMapper.byEntity(entityClass);
    if (visited.includes(resourceClass)) {
      return undefined;
    }

    const resources: BaseResource[] = [];
    for (const element of elements) {
      if (element instanceof BaseEntity) {
        resources.push(this.wrap(element, resourceClass, visited));
      }
    }
    return resources;
  }

  private normalizeRelation(
    descriptor: PropertyDescriptor,
    entity: BaseEntity,
    visited: readonly ResourceClass[],
  ): BaseResource | undefined {
    const resourceClass: ResourceClass = this.classMapper.byEntity(
      this.targetClass(descriptor, entity) ?? BaseEntity.classOf(entity),
    );
    if (visited.includes(resourceClass)) {
      return undefined;
    }

    return this.wrap(entity, resourceClass, visited);
  }

  private wrap(entity: BaseEntity, resourceClass: ResourceClass, visited: readonly ResourceClass[]): BaseResource {
    return resourceClass.createFromNormalizedMap(this.normalize(entity, {parentResources: visited}));
  }

  /**
   * The declared entity class of a relation, or the class of a sample value when the declaration names none.
   */
  private targetClass(descriptor: PropertyDescriptor, sample: unknown): EntityClass | undefined {
    const target: unknown = descriptor.target?.();
    if (BaseEntity.isEntityClass(target)) {
      return target;
    }

    return sample instanceof BaseEntity ? BaseEntity.classOf(sample) : undefined;
  }
}
