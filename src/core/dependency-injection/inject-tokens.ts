// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogFile: Symbol.for('LogFile'),
  LogSilent: Symbol.for('LogSilent'),
  MapperLogger: Symbol.for('MapperLogger'),
  ObjectMapper: Symbol.for('ObjectMapper'),
  ClassMapper: Symbol.for('ClassMapper'),
  EntityManager: Symbol.for('EntityManager'),
  EntityNormalizer: Symbol.for('EntityNormalizer'),
  ResourceToEntityMapper: Symbol.for('ResourceToEntityMapper'),
} as const;
