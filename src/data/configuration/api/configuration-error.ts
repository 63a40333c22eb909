// SPDX-License-Identifier: Apache-2.0

import {MapperError} from '../../../core/errors/mapper-error.js';

/**
 * General purpose error for configuration failures.
 */
export class ConfigurationError extends MapperError {
  public constructor(message: string, cause?: unknown, meta?: object) {
    super(message, cause, meta);
  }
}
