// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {LayeredConfigSource} from './layered-config-source.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

/**
 * A {@link ConfigSource} that reads configuration data from the environment.
 *
 * Let prefix = ENTITY_MAPPER
 *
 * Given:
 *  env = ENTITY_MAPPER_LOG_LEVEL=debug
 * Then:
 *  key = logLevel
 *  value = debug
 *
 * Values are kept verbatim; numbers and booleans are converted when they are read.
 */
export class EnvironmentConfigSource extends LayeredConfigSource implements ConfigSource {
  public static readonly DEFAULT_PREFIX: string = 'ENTITY_MAPPER';

  public constructor(
    prefix: string = EnvironmentConfigSource.DEFAULT_PREFIX,
    private readonly environment: NodeJS.ProcessEnv = process.env,
  ) {
    super(prefix);
    if (prefix.trim().length === 0) {
      throw new IllegalArgumentError('prefix must not be empty', prefix);
    }
  }

  public get name(): string {
    return 'EnvironmentConfigSource';
  }

  public get ordinal(): number {
    return 100;
  }

  public async load(): Promise<void> {
    this.data.clear();

    const leader: string = `${this.prefix}_`;
    for (const [variable, value] of Object.entries(this.environment)) {
      if (!variable.startsWith(leader) || variable.length === leader.length || value === undefined) {
        continue;
      }
      this.data.set(EnvironmentConfigSource.toPropertyName(variable.slice(leader.length)), value);
    }
  }

  /**
   * LOG_LEVEL -> logLevel
   */
  private static toPropertyName(variable: string): string {
    return variable
      .toLowerCase()
      .split('_')
      .filter(segment => segment.length > 0)
      .map((segment, index) => (index === 0 ? segment : segment.charAt(0).toUpperCase() + segment.slice(1)))
      .join('');
  }
}
