// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../../data/configuration/spi/config-source.js';
import {UnsupportedOperationError} from '../errors/unsupported-operation-error.js';

export class Comparators {
  private constructor() {
    throw new UnsupportedOperationError('utility classes and cannot be instantiated');
  }

  public static readonly number = (l: number, r: number): number => {
    if (l < r) {
      return -1;
    } else if (l > r) {
      return 1;
    }

    return 0;
  };

  public static readonly configSource = (l: ConfigSource, r: ConfigSource): number => {
    return Comparators.number(l.ordinal, r.ordinal);
  };
}
