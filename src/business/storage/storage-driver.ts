// SPDX-License-Identifier: Apache-2.0

/**
 * Backend in which Helm records release state.
 */
export enum StorageDriver {
  MEMORY = 'memory',
  CONFIGMAP = 'configmap',
  SECRET = 'secret',
  SQL = 'sql',
}

export class StorageDrivers {
  private static readonly ALL: readonly StorageDriver[] = [
    StorageDriver.MEMORY,
    StorageDriver.CONFIGMAP,
    StorageDriver.SECRET,
    StorageDriver.SQL,
  ];

  private constructor() {}

  public static names(): string[] {
    return [...StorageDrivers.ALL];
  }

  /**
   * Case-insensitive lookup.
   *
   * @returns the driver, or undefined for an unknown name
   */
  public static parse(value: string | undefined): StorageDriver | undefined {
    if (value === undefined) {
      return undefined;
    }
    const normalized: string = value.toLowerCase();
    return StorageDrivers.ALL.find((driver: StorageDriver): boolean => driver === normalized);
  }
}
