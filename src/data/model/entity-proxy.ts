// SPDX-License-Identifier: Apache-2.0

/**
 * A lazy-loading placeholder standing in for an entity whose state has not been fetched yet.
 *
 * Proxies are instances of a subclass of the real entity class. Loading fills in the inherited properties.
 */
export interface EntityProxy {
  /**
   * Loads the state of the entity, if not loaded already.
   */
  __load(): void;

  __isInitialized(): boolean;
}
