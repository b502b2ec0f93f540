// SPDX-License-Identifier: Apache-2.0

import {type CredentialSource} from '../spi/credential-source.js';
import {
  CLIENT_CONFIG_FIELDS,
  type ClientConfigField,
  type EffectiveClientConfig,
} from '../api/effective-client-config.js';
import {type Mutable} from '../../../types/index.js';

/**
 * Combines credential sources by precedence. Per field, the value of the highest ordinal source that sets it wins.
 */
export class LayeredClientConfig {
  private readonly _sources: CredentialSource[];

  public constructor(sources: CredentialSource[] = []) {
    this._sources = [...sources].sort(LayeredClientConfig.byOrdinalDescending);
  }

  public get sources(): CredentialSource[] {
    return [...this._sources];
  }

  /**
   * Reads every source in precedence order and merges the results.
   */
  public async resolve(): Promise<EffectiveClientConfig> {
    const partials: EffectiveClientConfig[] = [];
    for (const source of this._sources) {
      partials.push(await source.read());
    }
    return LayeredClientConfig.merge(partials);
  }

  /**
   * Merges partial configurations ordered from highest to lowest precedence.
   */
  public static merge(partials: readonly EffectiveClientConfig[]): EffectiveClientConfig {
    const merged: Mutable<EffectiveClientConfig> = {};
    for (const partial of partials) {
      for (const field of CLIENT_CONFIG_FIELDS) {
        if (!LayeredClientConfig.isSet(merged[field]) && LayeredClientConfig.isSet(partial[field])) {
          LayeredClientConfig.assign(merged, field, partial[field]);
        }
      }
    }
    return merged;
  }

  /**
   * Strings and lists count when non-empty, booleans and exec descriptors when present.
   */
  public static isSet(value: EffectiveClientConfig[ClientConfigField]): boolean {
    if (value === undefined || value === null) {
      return false;
    }
    if (typeof value === 'string' || Array.isArray(value)) {
      return value.length > 0;
    }
    return true;
  }

  private static assign<K extends ClientConfigField>(
    target: Mutable<EffectiveClientConfig>,
    field: K,
    value: EffectiveClientConfig[K],
  ): void {
    target[field] = value;
  }

  private static byOrdinalDescending(left: CredentialSource, right: CredentialSource): number {
    return right.ordinal - left.ordinal;
  }
}
