// SPDX-License-Identifier: Apache-2.0

/**
 * The plain structure an entity normalizes to, keyed by property name. Relations hold resource instances.
 */
export type NormalizedMap = Record<string, unknown>;
