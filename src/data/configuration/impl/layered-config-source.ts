// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';

export abstract class LayeredConfigSource implements ConfigSource {
  /**
   * The properties read by the last {@link load}.
   * @protected
   */
  protected readonly data: Map<string, string> = new Map<string, string>();

  protected constructor(public readonly prefix?: string) {}

  public abstract get name(): string;
  public abstract get ordinal(): number;

  public abstract load(): Promise<void>;

  public properties(): Map<string, string> {
    return new Map<string, string>(this.data);
  }
}
