// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {ExplicitCredentialSource} from '../../../../../src/data/configuration/impl/explicit-credential-source.js';
import {type EffectiveClientConfig} from '../../../../../src/data/configuration/api/effective-client-config.js';

describe('ExplicitCredentialSource', (): void => {
  it('should report nothing without a kubernetes block', async (): Promise<void> => {
    expect(await new ExplicitCredentialSource().read()).to.deep.equal({});
  });

  it('should report the non-empty fields of the block', async (): Promise<void> => {
    const source: ExplicitCredentialSource = new ExplicitCredentialSource({
      host: 'https://api.example.test',
      token: 'test-token',
      username: '',
      insecure: false,
      configPaths: [],
    });

    const partial: EffectiveClientConfig = await source.read();

    expect(partial).to.deep.equal({host: 'https://api.example.test', token: 'test-token', insecure: false});
    expect(source.ordinal).to.equal(300);
  });

  it('should use the first exec entry', async (): Promise<void> => {
    const source: ExplicitCredentialSource = new ExplicitCredentialSource({
      exec: [{apiVersion: 'client.authentication.k8s.io/v1', command: 'get-token', args: ['--profile', 'test']}],
    });

    expect((await source.read()).exec).to.deep.equal({
      apiVersion: 'client.authentication.k8s.io/v1',
      command: 'get-token',
      args: ['--profile', 'test'],
      env: {},
    });
  });

  it('should treat an empty exec list as unset', async (): Promise<void> => {
    expect(await new ExplicitCredentialSource({exec: []}).read()).to.deep.equal({});
  });
});
