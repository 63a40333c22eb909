// SPDX-License-Identifier: Apache-2.0

import {MapperError} from '../../../core/errors/mapper-error.js';

/**
 * Thrown when a class has no registered counterpart. Always a configuration error.
 */
export class UnmappedTypeError extends MapperError {
  /**
   * error metadata will include `type`
   *
   * @param message - error message
   * @param type - name of the class without a mapping
   */
  public constructor(message: string, type: string) {
    super(message, undefined, {type});
  }
}
