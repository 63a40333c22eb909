// SPDX-License-Identifier: Apache-2.0

import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';

/**
 * Read-only view of the merged configuration properties.
 */
export interface Config {
  asBoolean(key: string): boolean | null;

  asNumber(key: string): number | null;

  asString(key: string): string | null;

  /**
   * Binds all properties to a new instance of the given class.
   */
  asObject<T>(cls: ClassConstructor<T>): T;

  properties(): Map<string, string>;
}
