// SPDX-License-Identifier: Apache-2.0

import {type EffectiveClientConfig} from '../api/effective-client-config.js';

/**
 * A single origin of client connection settings.
 */
export interface CredentialSource {
  /**
   * The name of the source, used in logs and error messages.
   */
  readonly name: string;

  /**
   * Precedence of the source. A higher ordinal wins over a lower one.
   */
  readonly ordinal: number;

  /**
   * Reads the partial configuration supplied by this source. Absent data is reported as unset fields.
   */
  read(): Promise<EffectiveClientConfig>;
}
