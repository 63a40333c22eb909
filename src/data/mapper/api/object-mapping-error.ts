// SPDX-License-Identifier: Apache-2.0

import {MapperError} from '../../../core/errors/mapper-error.js';

/**
 * Thrown by an object mapper when an error occurs during the mapping process. Errors can occur when the object to be
 * mapped is not in the expected format or a type conversion fails.
 */
export class ObjectMappingError extends MapperError {
  public constructor(message: string, cause?: unknown, meta?: object) {
    super(message, cause, meta);
  }
}
