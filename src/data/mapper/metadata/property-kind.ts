// SPDX-License-Identifier: Apache-2.0

export enum PropertyKind {
  SCALAR = 'scalar',
  DATE = 'date',
  RELATION = 'relation',
  COLLECTION = 'collection',
}
