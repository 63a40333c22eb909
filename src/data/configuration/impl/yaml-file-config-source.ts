// SPDX-License-Identifier: Apache-2.0

import {readFile} from 'node:fs/promises';
import yaml from 'yaml';
import {type ConfigSource} from '../spi/config-source.js';
import {LayeredConfigSource} from './layered-config-source.js';
import {ConfigurationError} from '../api/configuration-error.js';

/**
 * A {@link ConfigSource} that reads the top-level keys of a YAML file. Nested values are kept as JSON strings.
 */
export class YamlFileConfigSource extends LayeredConfigSource implements ConfigSource {
  public constructor(public readonly filePath: string) {
    super();
  }

  public get name(): string {
    return 'YamlFileConfigSource';
  }

  public get ordinal(): number {
    return 50;
  }

  public async load(): Promise<void> {
    this.data.clear();

    let contents: string;
    try {
      contents = await readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`failed to read file: ${this.filePath}`, error, {filePath: this.filePath});
    }

    let document: unknown;
    try {
      document = yaml.parse(contents);
    } catch (error) {
      throw new ConfigurationError(`error parsing yaml file: ${this.filePath}`, error, {filePath: this.filePath});
    }

    if (document === null || document === undefined) {
      return;
    }
    if (typeof document !== 'object' || Array.isArray(document)) {
      throw new ConfigurationError(`yaml file must contain a mapping: ${this.filePath}`, undefined, {
        filePath: this.filePath,
      });
    }

    for (const [key, value] of Object.entries(document)) {
      if (value === null || value === undefined) {
        continue;
      }
      this.data.set(key, typeof value === 'string' ? value : JSON.stringify(value));
    }
  }
}
