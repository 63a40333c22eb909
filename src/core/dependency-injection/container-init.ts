// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import {container, Lifecycle} from 'tsyringe-neo';
import {type MapperLogger} from '../logging/mapper-logger.js';
import {MapperWinstonLogger} from '../logging/mapper-winston-logger.js';
import {InjectTokens} from './inject-tokens.js';
import {ClassToObjectMapper} from '../../data/mapper/impl/class-to-object-mapper.js';
import {ClassMapper} from '../../data/mapper/impl/class-mapper.js';
import {EntityNormalizer} from '../../data/mapper/impl/entity-normalizer.js';
import {ResourceToEntityMapper} from '../../data/mapper/impl/resource-to-entity-mapper.js';
import {type EntityManager} from '../../data/persistence/api/entity-manager.js';
import {InMemoryEntityManager} from '../../data/persistence/impl/in-memory-entity-manager.js';
import {MapperConfiguration} from '../../data/configuration/model/mapper-configuration.js';
import {type ObjectMapper} from '../../data/mapper/api/object-mapper.js';
import {type ConfigSource} from '../../data/configuration/spi/config-source.js';
import {EnvironmentConfigSource} from '../../data/configuration/impl/environment-config-source.js';
import {YamlFileConfigSource} from '../../data/configuration/impl/yaml-file-config-source.js';
import {LayeredConfig} from '../../data/configuration/impl/layered-config.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | null = null;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param configuration - logging settings, defaults to a {@link MapperConfiguration} with its default values
   * @param entityManager - the persistence lookup used to resolve relations, defaults to an in-memory one
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    configuration: MapperConfiguration = new MapperConfiguration(),
    entityManager?: EntityManager,
    testLogger?: MapperLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<MapperLogger>(InjectTokens.MapperLogger).debug('Container already initialized');
      return;
    }

    // MapperLogger
    container.register(InjectTokens.LogLevel, {useValue: configuration.logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: configuration.developmentMode});
    container.register(InjectTokens.LogFile, {useValue: configuration.logFile});
    container.register(InjectTokens.LogSilent, {useValue: configuration.silent});
    if (testLogger) {
      container.registerInstance(InjectTokens.MapperLogger, testLogger);
      container.resolve<MapperLogger>(InjectTokens.MapperLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.MapperLogger, {useClass: MapperWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<MapperLogger>(InjectTokens.MapperLogger).debug('Using default logger');
    }

    // Data Layer ObjectMapper
    this.registerObjectMapper();

    // Persistence
    if (entityManager) {
      container.registerInstance(InjectTokens.EntityManager, entityManager);
    } else {
      container.register(
        InjectTokens.EntityManager,
        {useClass: InMemoryEntityManager},
        {lifecycle: Lifecycle.Singleton},
      );
    }

    // Mappers
    container.register(InjectTokens.ClassMapper, {useClass: ClassMapper}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.EntityNormalizer, {useClass: EntityNormalizer}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.ResourceToEntityMapper,
      {useClass: ResourceToEntityMapper},
      {lifecycle: Lifecycle.Singleton},
    );

    container.resolve<MapperLogger>(InjectTokens.MapperLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * Loads the configuration from the environment (ENTITY_MAPPER_*) and, when given, a YAML file, then re-initializes
   * the container with it. Environment variables take precedence over the file.
   * @param configFile - path of a YAML configuration file
   * @param entityManager - the persistence lookup used to resolve relations
   * @param testLogger - a test logger to use, if provided
   */
  public async configure(configFile?: string, entityManager?: EntityManager, testLogger?: MapperLogger): Promise<void> {
    this.registerObjectMapper();

    const sources: ConfigSource[] = [new EnvironmentConfigSource()];
    if (configFile) {
      sources.push(new YamlFileConfigSource(configFile));
    }
    const config: LayeredConfig = new LayeredConfig(
      sources,
      container.resolve<ObjectMapper>(InjectTokens.ObjectMapper),
    );
    await config.load();

    this.reset(config.asObject(MapperConfiguration), entityManager, testLogger);
  }

  /**
   * clears the container registries and re-initializes the container
   * @param configuration - logging settings
   * @param entityManager - the persistence lookup used to resolve relations
   * @param testLogger - a test logger to use, if provided
   */
  public reset(configuration?: MapperConfiguration, entityManager?: EntityManager, testLogger?: MapperLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<MapperLogger>(InjectTokens.MapperLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(configuration, entityManager, testLogger);
  }

  private registerObjectMapper(): void {
    if (!container.isRegistered(InjectTokens.ObjectMapper)) {
      container.register(InjectTokens.ObjectMapper, {useClass: ClassToObjectMapper}, {lifecycle: Lifecycle.Singleton});
    }
  }

  /**
   * only call dispose when you are about to exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
