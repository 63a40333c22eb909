// SPDX-License-Identifier: Apache-2.0

import {MapperError} from '../../../core/errors/mapper-error.js';

/**
 * Thrown when a resource references an entity by an identifier that does not exist.
 */
export class RelatedEntityNotFoundError extends MapperError {
  public constructor(
    public readonly entity: string,
    public readonly id: number,
  ) {
    super(`${entity} entity with id ${id} not found!`, undefined, {entity, id});
  }
}
