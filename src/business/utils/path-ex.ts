// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';

export class PathEx {
  private constructor() {}

  /**
   * Joins the given paths. This is a wrapper around path.join. It is recommended to only use this when you are dealing
   * with part of a path that is not a complete path reference on its own.
   *
   * This method is not safe unless literals are used as parameters.
   */
  public static join(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.normalize(path.join(...paths));
  }

  /**
   * Splits a list of paths joined by the platform path delimiter, dropping empty entries.
   */
  public static splitList(value: string, delimiter: string = path.delimiter): string[] {
    return value.split(delimiter).filter((entry: string): boolean => entry.length > 0);
  }

  /**
   * Expands a leading `~` to the given home directory.
   */
  public static expandHome(value: string, homeDirectory: string): string {
    if (value === '~') {
      return homeDirectory;
    }
    if (value.startsWith('~/') || value.startsWith('~\\')) {
      return PathEx.join(homeDirectory, value.slice(2));
    }
    return value;
  }
}
