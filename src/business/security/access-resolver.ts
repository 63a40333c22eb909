// SPDX-License-Identifier: Apache-2.0

import {type AccessResolverConfiguration} from './access-resolver-configuration.js';

export interface AccessResolver {
  isObjectAccessGranted(configuration: AccessResolverConfiguration, object: object): boolean;
}
