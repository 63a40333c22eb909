// SPDX-License-Identifier: Apache-2.0

import {type AccessResolver} from './access-resolver.js';
import {type AccessResolverConfiguration} from './access-resolver-configuration.js';
import {type UserProvider} from './user-provider.js';
import {EntityAccessor} from '../../data/mapper/impl/entity-accessor.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

const COLLECTION_SUFFIX: string = '[]';

/**
 * Grants access to an object when the current user owns it, as determined by following the configured owner
 * property path from the object.
 */
export class OwnerPropertyAccessResolver implements AccessResolver {
  public constructor(private readonly userProvider: UserProvider) {}

  /**
   * @throws IllegalArgumentError if the configuration has no owner property path, or a collection segment is not the
   * last one
   */
  public isObjectAccessGranted(configuration: AccessResolverConfiguration, object: object): boolean {
    const propertyPath: string = OwnerPropertyAccessResolver.ownerPropertyPath(configuration);
    const segments: string[] = propertyPath.split('.');
    if (segments.slice(0, -1).some(segment => segment.endsWith(COLLECTION_SUFFIX))) {
      throw new IllegalArgumentError('Collection is not supported as non-last element.', propertyPath);
    }

    let current: unknown = object;
    let isCollection: boolean = false;
    for (const segment of segments) {
      if (typeof current !== 'object' || current === null) {
        return false;
      }

      isCollection = segment.endsWith(COLLECTION_SUFFIX);
      current = EntityAccessor.get(current, isCollection ? segment.slice(0, -COLLECTION_SUFFIX.length) : segment);
    }

    const user: object | null = this.userProvider.getUser();
    if (!user) {
      return false;
    }

    if (isCollection) {
      return Array.isArray(current) && current.includes(user);
    }

    const userId: unknown = EntityAccessor.get(user, 'id');
    if (typeof current === 'object' && current !== null) {
      return EntityAccessor.get(current, 'id') === userId;
    }
    return current === userId;
  }

  private static ownerPropertyPath(configuration: AccessResolverConfiguration): string {
    const path: string | undefined = configuration.config?.ownerPropertyPath;
    if (!path) {
      throw new IllegalArgumentError(
        `Access resolver configuration for "${OwnerPropertyAccessResolver.name}" does not contain required "ownerPropertyPath" entry`,
      );
    }
    return path;
  }
}
