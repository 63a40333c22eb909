// SPDX-License-Identifier: Apache-2.0

import pluralize from 'pluralize';
import {UnsupportedOperationError} from '../errors/unsupported-operation-error.js';

/**
 * English word helpers used to derive accessor method names from property names.
 */
export class Inflector {
  private constructor() {
    throw new UnsupportedOperationError('utility classes and cannot be instantiated');
  }

  public static capitalize(word: string): string {
    return word.length === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1);
  }

  /**
   * Singular form of the last word of a camelCase name, or null when the name has no distinct singular form.
   *
   * @param word - a camelCase property name, e.g. `shippingAddresses`
   */
  public static singularize(word: string): string | null {
    const boundary: number = Inflector.lastWordStart(word);
    const tail: string = word.slice(boundary);
    const singular: string = pluralize.singular(tail.toLowerCase());
    if (singular.length === 0) {
      return null;
    }

    const candidate: string = word.slice(0, boundary) + Inflector.matchCase(singular, tail);
    return candidate === word ? null : candidate;
  }

  private static lastWordStart(word: string): number {
    for (let index = word.length - 1; index > 0; index--) {
      const character: string = word.charAt(index);
      if (character !== character.toLowerCase()) {
        return index;
      }
    }

    return 0;
  }

  private static matchCase(word: string, template: string): string {
    return template.charAt(0) === template.charAt(0).toUpperCase() ? Inflector.capitalize(word) : word;
  }
}
