// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';

@Exclude()
export class MapperConfiguration {
  @Expose()
  public logLevel: string = 'info';

  @Expose()
  public developmentMode: boolean = false;

  /** Log to this file instead of the console. */
  @Expose()
  public logFile: string | null = null;

  @Expose()
  public silent: boolean = false;
}
