// SPDX-License-Identifier: Apache-2.0

import {type EnvironmentSnapshot} from '../../types/index.js';
import {StringEx} from './string-ex.js';

const TRUE_VALUES: ReadonlySet<string> = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES: ReadonlySet<string> = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

/**
 * Helpers for reading typed values out of an environment snapshot.
 */
export class EnvironmentEx {
  private constructor() {}

  /**
   * Copies the current process environment into a frozen snapshot.
   */
  public static snapshot(source: NodeJS.ProcessEnv = process.env): EnvironmentSnapshot {
    return Object.freeze({...source});
  }

  /**
   * Returns the variable value, or undefined when it is missing or empty.
   */
  public static string(environment: EnvironmentSnapshot, name: string): string | undefined {
    const value: string | undefined = environment[name];
    return StringEx.isEmpty(value) ? undefined : value;
  }

  /**
   * Parses a boolean variable. Unrecognised values are treated as unset.
   */
  public static boolean(environment: EnvironmentSnapshot, name: string): boolean | undefined {
    const value: string | undefined = environment[name];
    if (value === undefined) {
      return undefined;
    }
    if (TRUE_VALUES.has(value)) {
      return true;
    }
    if (FALSE_VALUES.has(value)) {
      return false;
    }
    return undefined;
  }
}
