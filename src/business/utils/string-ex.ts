// SPDX-License-Identifier: Apache-2.0

export class StringEx {
  public static readonly EMPTY: string = '';

  private constructor() {}

  public static isEmpty(value: string | undefined | null): value is undefined | null | '' {
    return value === undefined || value === null || value.length === 0;
  }

  public static isBlank(value: string | undefined | null): boolean {
    return StringEx.isEmpty(value) || value.trim().length === 0;
  }

  /**
   * Returns the first argument that is a non-empty string.
   */
  public static firstNonEmpty(...values: (string | undefined | null)[]): string | undefined {
    for (const value of values) {
      if (!StringEx.isEmpty(value)) {
        return value;
      }
    }
    return undefined;
  }
}
