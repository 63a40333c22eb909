// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type EntityClass} from '../../model/base-entity.js';
import {type ResourceClass} from '../../model/base-resource.js';
import {type MappingCondition} from '../api/mapping-context.js';
import {UnmappedTypeError} from '../api/unmapped-type-error.js';
import {type MapperLogger} from '../../../core/logging/mapper-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';

/**
 * Registry of the correspondence between resource classes and entity classes.
 *
 * One resource class may map to several entity classes, each under its own condition, plus one unconditional
 * default. Registrations happen at startup; lookups afterwards are read-only.
 */
@injectable()
export class ClassMapper {
  private readonly defaults: Map<ResourceClass, EntityClass> = new Map();
  private readonly conditional: Map<ResourceClass, Map<MappingCondition, EntityClass>> = new Map();
  private readonly resources: Map<EntityClass, ResourceClass> = new Map();
  private readonly logger: MapperLogger;

  public constructor(@inject(InjectTokens.MapperLogger) logger?: MapperLogger) {
    this.logger = patchInject(logger, InjectTokens.MapperLogger, this.constructor.name);
  }

  /**
   * Registers a correspondence. The last registration for a resource class and condition wins.
   *
   * @param resourceClass - the resource class
   * @param entityClass - the entity class it maps to
   * @param condition - when given, the mapping only applies to lookups made with this condition
   */
  public registerMapping(resourceClass: ResourceClass, entityClass: EntityClass, condition?: MappingCondition): this {
    if (condition === undefined) {
      this.defaults.set(resourceClass, entityClass);
    } else {
      let byCondition: Map<MappingCondition, EntityClass> | undefined = this.conditional.get(resourceClass);
      if (!byCondition) {
        byCondition = new Map();
        this.conditional.set(resourceClass, byCondition);
      }
      byCondition.set(condition, entityClass);
    }
    this.resources.set(entityClass, resourceClass);

    this.logger.debug(
      `Registered class mapping [ resource = '${resourceClass.name}', entity = '${entityClass.name}', condition = '${ClassMapper.conditionName(condition)}' ]`,
    );
    return this;
  }

  /**
   * @throws UnmappedTypeError if the entity class was never registered
   */
  public byEntity(entityClass: EntityClass): ResourceClass {
    const resourceClass: ResourceClass | undefined = this.resources.get(entityClass);
    if (!resourceClass) {
      throw new UnmappedTypeError(`No resource class is mapped to entity class ${entityClass.name}`, entityClass.name);
    }
    return resourceClass;
  }

  /**
   * Resolves the entity class of a resource class. A mapping registered under the given condition takes precedence
   * over the unconditional one.
   *
   * @throws UnmappedTypeError if neither a matching conditional nor an unconditional mapping exists
   */
  public byResource(resourceClass: ResourceClass, condition?: MappingCondition): EntityClass {
    if (condition !== undefined) {
      const conditional: EntityClass | undefined = this.conditional.get(resourceClass)?.get(condition);
      if (conditional) {
        return conditional;
      }
    }

    const entityClass: EntityClass | undefined = this.defaults.get(resourceClass);
    if (!entityClass) {
      throw new UnmappedTypeError(
        `No entity class is mapped to resource class ${resourceClass.name} [ condition = '${ClassMapper.conditionName(condition)}' ]`,
        resourceClass.name,
      );
    }
    return entityClass;
  }

  private static conditionName(condition?: MappingCondition): string {
    if (condition === undefined) {
      return '';
    }
    return typeof condition === 'string' ? condition : condition.name;
  }
}
