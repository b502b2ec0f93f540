// SPDX-License-Identifier: Apache-2.0

export class ObjectEx {
  private constructor() {}

  /**
   * Freezes the value and everything reachable from it.
   */
  public static deepFreeze<T>(value: T): Readonly<T> {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      Object.freeze(value);
      for (const nested of Object.values(value)) {
        ObjectEx.deepFreeze(nested);
      }
    }
    return value;
  }
}
