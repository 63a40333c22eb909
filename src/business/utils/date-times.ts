// SPDX-License-Identifier: Apache-2.0

import {UnsupportedOperationError} from '../errors/unsupported-operation-error.js';

export class DateTimes {
  private constructor() {
    throw new UnsupportedOperationError('utility classes and cannot be instantiated');
  }

  /**
   * Formats a date as an RFC 3339 timestamp in UTC with an explicit offset, e.g. `2024-03-01T12:00:00+00:00`.
   */
  public static toRfc3339(date: Date): string {
    return `${date.toISOString().slice(0, 19)}+00:00`;
  }

  public static epochSeconds(date: Date): number {
    return Math.floor(date.getTime() / 1000);
  }

  public static copy(date: Date): Date {
    return new Date(date.getTime());
  }
}
