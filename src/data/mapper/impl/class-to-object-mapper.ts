// SPDX-License-Identifier: Apache-2.0

import {type ObjectMapper} from '../api/object-mapper.js';
import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';
import {instanceToPlain, plainToInstance} from 'class-transformer';
import {ObjectMappingError} from '../api/object-mapping-error.js';
import {injectable} from 'tsyringe-neo';

@injectable()
export class ClassToObjectMapper implements ObjectMapper {
  public fromArray<T>(cls: ClassConstructor<T>, array: object[]): T[] {
    const result: T[] = [];
    for (const item of array) {
      result.push(this.fromObject(cls, item));
    }
    return result;
  }

  public fromObject<T>(cls: ClassConstructor<T>, object: object): T {
    try {
      return plainToInstance(cls, object, {exposeDefaultValues: true});
    } catch (error) {
      throw new ObjectMappingError(`Error converting object to class instance [ cls = '${cls.name}' ]`, error);
    }
  }

  public toArray<T extends object>(data: T[]): Record<string, unknown>[] {
    const result: Record<string, unknown>[] = [];

    for (const item of data) {
      result.push(this.toObject(item));
    }
    return result;
  }

  public toObject<T extends object>(data: T): Record<string, unknown> {
    try {
      return instanceToPlain(data);
    } catch (error) {
      throw new ObjectMappingError(
        `Error converting class instance to object [ cls = '${data.constructor.name}' ]`,
        error,
      );
    }
  }
}
