// SPDX-License-Identifier: Apache-2.0

/**
 * Access rule attached to a resource class.
 *
 * @example
 * ```typescript
 * const rule: AccessResolverConfiguration = {config: {ownerPropertyPath: 'order.customer'}};
 * ```
 */
export interface AccessResolverConfiguration {
  readonly config?: OwnerPropertyConfig | null;
}

export interface OwnerPropertyConfig {
  /**
   * Dot separated path from the guarded object to its owner, e.g. `order.customer`. The last segment may end in `[]`
   * when it names a collection of owners.
   */
  readonly ownerPropertyPath?: string;
}
