// SPDX-License-Identifier: Apache-2.0

/**
 * Supplies the authenticated user of the current request.
 */
export interface UserProvider {
  getUser(): object | null;
}
