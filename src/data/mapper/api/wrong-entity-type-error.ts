// SPDX-License-Identifier: Apache-2.0

import {MapperError} from '../../../core/errors/mapper-error.js';

export class WrongEntityTypeError extends MapperError {
  /**
   * error metadata will include `expected` and `found` class names
   *
   * @param message - error message
   * @param expected - expected entity class
   * @param found - class of the entity produced
   */
  public constructor(message: string, expected: string, found: string) {
    super(message, undefined, {expected, found});
  }
}
