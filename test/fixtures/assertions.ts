// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';

type ErrorType<E extends Error> = new (...arguments_: never[]) => E;

/**
 * Runs the action and returns the error it rejects with, failing the test unless it is an instance of the given type.
 */
export async function expectRejection<E extends Error>(action: () => Promise<unknown>, type: ErrorType<E>): Promise<E> {
  try {
    await action();
  } catch (error) {
    expect(error).to.be.instanceOf(type);
    if (error instanceof type) {
      return error;
    }
  }
  return expect.fail(`expected ${type.name} to be thrown`);
}

export function expectThrow<E extends Error>(action: () => unknown, type: ErrorType<E>): E {
  try {
    action();
  } catch (error) {
    expect(error).to.be.instanceOf(type);
    if (error instanceof type) {
      return error;
    }
  }
  return expect.fail(`expected ${type.name} to be thrown`);
}
