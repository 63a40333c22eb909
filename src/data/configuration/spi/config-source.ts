// SPDX-License-Identifier: Apache-2.0

/**
 * A configuration source defines the methods for reading configuration data from a configuration source.
 * {@link ConfigSource} instances provide read-only access to configuration data.
 *
 * Represents the contents of the shell environment or of a configuration file.
 */
export interface ConfigSource {
  /**
   * The name of the configuration source.
   */
  readonly name: string;

  /**
   * The ordinal of the configuration source. Sources with a higher ordinal override those with a lower one.
   */
  readonly ordinal: number;

  /**
   * The prefix that is used to filter configuration
   * keys that are read from the configuration source.
   */
  readonly prefix?: string;

  /**
   * Loads the configuration data from the configuration source.
   */
  load(): Promise<void>;

  /**
   * The loaded properties, keyed by camelCase property name. Values are kept in their string form.
   */
  properties(): Map<string, string>;
}
