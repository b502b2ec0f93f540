// SPDX-License-Identifier: Apache-2.0

import {type ClassProvider, Lifecycle} from 'tsyringe-neo';

export type InjectableClass = ClassProvider<unknown>['useClass'];

export class SingletonContainer {
  public readonly lifecycle: Lifecycle;

  public constructor(
    public readonly token: symbol,
    public readonly useClass: InjectableClass,
  ) {
    this.lifecycle = Lifecycle.Singleton;
  }
}
