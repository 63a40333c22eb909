// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';

export {MapperError} from './core/errors/mapper-error.js';
export {IllegalArgumentError} from './core/errors/illegal-argument-error.js';
export {type MapperLogger} from './core/logging/mapper-logger.js';
export {MapperWinstonLogger} from './core/logging/mapper-winston-logger.js';
export {InjectTokens} from './core/dependency-injection/inject-tokens.js';
export {Container} from './core/dependency-injection/container-init.js';

export {PropertyKind} from './data/mapper/metadata/property-kind.js';
export {type PropertyDescriptor, type TargetResolver} from './data/mapper/metadata/property-descriptor.js';
export {PropertyMetadata} from './data/mapper/metadata/property-metadata.js';
export {
  Collection,
  type CollectionOptions,
  DateField,
  Field,
  type FieldOptions,
  Ignore,
  Relation,
} from './data/mapper/metadata/property-decorators.js';

export {
  type MappingCondition,
  type MappingContext,
  type NormalizationContext,
} from './data/mapper/api/mapping-context.js';
export {type NormalizedMap} from './data/mapper/api/normalized-map.js';
export {type Normalizer} from './data/mapper/api/normalizer.js';
export {type ResourceMapper} from './data/mapper/api/resource-mapper.js';
export {type ObjectMapper} from './data/mapper/api/object-mapper.js';
export {ObjectMappingError} from './data/mapper/api/object-mapping-error.js';
export {UnmappedTypeError} from './data/mapper/api/unmapped-type-error.js';
export {RelatedEntityNotFoundError} from './data/mapper/api/related-entity-not-found-error.js';
export {UninitializedEntityError} from './data/mapper/api/uninitialized-entity-error.js';
export {WrongEntityTypeError} from './data/mapper/api/wrong-entity-type-error.js';
export {ClassMapper} from './data/mapper/impl/class-mapper.js';
export {ClassToObjectMapper} from './data/mapper/impl/class-to-object-mapper.js';
export {EntityAccessor} from './data/mapper/impl/entity-accessor.js';
export {EntityNormalizer} from './data/mapper/impl/entity-normalizer.js';
export {ResourceToEntityMapper} from './data/mapper/impl/resource-to-entity-mapper.js';

export {BaseEntity, type EntityClass} from './data/model/base-entity.js';
export {BaseResource, type ResourceClass} from './data/model/base-resource.js';
export {type EntityProxy} from './data/model/entity-proxy.js';

export {type EntityManager} from './data/persistence/api/entity-manager.js';
export {InMemoryEntityManager} from './data/persistence/impl/in-memory-entity-manager.js';

export {type Config} from './data/configuration/api/config.js';
export {ConfigurationError} from './data/configuration/api/configuration-error.js';
export {type ConfigSource} from './data/configuration/spi/config-source.js';
export {EnvironmentConfigSource} from './data/configuration/impl/environment-config-source.js';
export {YamlFileConfigSource} from './data/configuration/impl/yaml-file-config-source.js';
export {LayeredConfig} from './data/configuration/impl/layered-config.js';
export {MapperConfiguration} from './data/configuration/model/mapper-configuration.js';

export {
  type AccessResolverConfiguration,
  type OwnerPropertyConfig,
} from './business/security/access-resolver-configuration.js';
export {type AccessResolver} from './business/security/access-resolver.js';
export {type UserProvider} from './business/security/user-provider.js';
export {OwnerPropertyAccessResolver} from './business/security/owner-property-access-resolver.js';
