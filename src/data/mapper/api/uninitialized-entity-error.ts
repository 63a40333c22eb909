// SPDX-License-Identifier: Apache-2.0

import {MapperError} from '../../../core/errors/mapper-error.js';

export class UninitializedEntityError extends MapperError {
  public constructor(message: string, cause?: unknown, meta?: object) {
    super(message, cause, meta);
  }
}
