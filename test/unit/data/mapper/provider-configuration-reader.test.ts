// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import fs from 'node:fs';

import {ProviderConfigurationReader} from '../../../../src/data/mapper/provider-configuration-reader.js';
import {type ProviderConfiguration} from '../../../../src/data/schema/model/provider/provider-configuration.js';
import {ConfigurationError} from '../../../../src/data/configuration/api/configuration-error.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {makeTemporaryDirectory} from '../../../test-container.js';
import {expectRejection, expectThrow} from '../../../fixtures/assertions.js';

describe('ProviderConfigurationReader', (): void => {
  const reader: ProviderConfigurationReader = new ProviderConfigurationReader();

  it('should map snake_case keys onto the configuration', (): void => {
    const configuration: ProviderConfiguration = reader.parse(
      [
        'debug: true',
        'helm_driver: configmap',
        'plugins_path: /opt/helm/plugins',
        'repository_cache: /tmp/cache',
        'unknown_key: ignored',
        'kubernetes:',
        '  host: https://api.example.test',
        '  insecure: true',
        '  config_paths: [/a/config, /b/config]',
        '  config_context: dev',
        '  exec:',
        '    - api_version: client.authentication.k8s.io/v1',
        '      command: get-token',
        '      args: [--profile, test]',
        '      env:',
        '        PROFILE: test',
      ].join('\n'),
    );

    expect(configuration.debug).to.be.true;
    expect(configuration.helmDriver).to.equal('configmap');
    expect(configuration.pluginsPath).to.equal('/opt/helm/plugins');
    expect(configuration.repositoryCache).to.equal('/tmp/cache');
    expect(configuration.registryConfigPath).to.be.undefined;
    expect(configuration).to.not.have.property('unknown_key');
    expect(configuration.kubernetes?.host).to.equal('https://api.example.test');
    expect(configuration.kubernetes?.insecure).to.be.true;
    expect(configuration.kubernetes?.configPaths).to.deep.equal(['/a/config', '/b/config']);
    expect(configuration.kubernetes?.configContext).to.equal('dev');
    expect(configuration.kubernetes?.exec).to.have.lengthOf(1);
    expect(configuration.kubernetes?.exec?.[0].apiVersion).to.equal('client.authentication.k8s.io/v1');
    expect(configuration.kubernetes?.exec?.[0].command).to.equal('get-token');
    expect(configuration.kubernetes?.exec?.[0].args).to.deep.equal(['--profile', 'test']);
    expect(configuration.kubernetes?.exec?.[0].env).to.deep.equal({PROFILE: 'test'});
  });

  it('should read an empty document as an empty configuration', (): void => {
    const configuration: ProviderConfiguration = reader.parse('');

    expect(configuration.helmDriver).to.be.undefined;
    expect(configuration.kubernetes).to.be.undefined;
  });

  it('should reject documents that are not mappings', (): void => {
    const error: ConfigurationError = expectThrow((): unknown => reader.parse('- a\n- b\n', 'list.yaml'), ConfigurationError);
    expect(error.message).to.equal('provider configuration must be a mapping: list.yaml');
  });

  it('should reject a kubernetes value that is not a mapping', (): void => {
    const error: ConfigurationError = expectThrow((): unknown => reader.parse('kubernetes: [1, 2]'), ConfigurationError);

    expect(error.message).to.match(/^provider configuration is invalid: <inline>: /);
    expect(error.meta.violations).to.include('kubernetes: kubernetes must be an object');
  });

  it('should reject an exec block written as a single mapping', (): void => {
    const error: ConfigurationError = expectThrow(
      (): unknown => reader.parse('kubernetes:\n  exec:\n    api_version: v1\n    command: aws\n', 'exec.yaml'),
      ConfigurationError,
    );

    expect(error.meta.source).to.equal('exec.yaml');
    expect(error.meta.violations).to.include('kubernetes.exec: exec must be an array');
  });

  it('should reject more than one exec block', (): void => {
    const error: ConfigurationError = expectThrow(
      (): unknown =>
        reader.parse(
          ['kubernetes:', '  exec:', '    - api_version: v1', '      command: a', '    - api_version: v1', '      command: b'].join(
            '\n',
          ),
        ),
      ConfigurationError,
    );

    expect(error.meta.violations).to.deep.equal(['kubernetes.exec: exec must contain no more than 1 elements']);
  });

  it('should reject exec entries of the wrong type', (): void => {
    const error: ConfigurationError = expectThrow(
      (): unknown => reader.parse('kubernetes:\n  exec:\n    - command: aws\n      args: --profile\n'),
      ConfigurationError,
    );

    expect(error.meta.violations).to.deep.equal(['kubernetes.exec.0.args: args must be an array']);
  });

  it('should reject a config path list written as a single path', (): void => {
    const error: ConfigurationError = expectThrow(
      (): unknown => reader.parse('kubernetes:\n  config_paths: /a/config\n'),
      ConfigurationError,
    );

    expect(error.meta.violations).to.deep.equal(['kubernetes.configPaths: configPaths must be an array']);
  });

  it('should reject booleans given as strings', (): void => {
    const error: ConfigurationError = expectThrow(
      (): unknown => reader.parse('debug: "true"\nkubernetes:\n  insecure: "false"\n'),
      ConfigurationError,
    );

    expect(error.meta.violations).to.deep.equal([
      'debug: debug must be a boolean value',
      'kubernetes.insecure: insecure must be a boolean value',
    ]);
    expect(error.message).to.equal(
      'provider configuration is invalid: <inline>: debug: debug must be a boolean value; ' +
        'kubernetes.insecure: insecure must be a boolean value',
    );
  });

  it('should reject strings given as numbers', (): void => {
    const error: ConfigurationError = expectThrow(
      (): unknown => reader.parse('helm_driver: 1\nkubernetes:\n  host: 8443\n'),
      ConfigurationError,
    );

    expect(error.meta.violations).to.deep.equal([
      'helmDriver: helmDriver must be a string',
      'kubernetes.host: host must be a string',
    ]);
  });

  it('should reject invalid YAML', (): void => {
    const error: ConfigurationError = expectThrow((): unknown => reader.parse('debug: [true'), ConfigurationError);
    expect(error.message).to.equal('provider configuration is not valid YAML: <inline>');
  });

  it('should read configuration files', async (): Promise<void> => {
    const file: string = PathEx.join(makeTemporaryDirectory(), 'provider.yaml');
    fs.writeFileSync(file, 'helm_driver: memory\n');

    expect((await reader.readFile(file)).helmDriver).to.equal('memory');
  });

  it('should fail on unreadable files', async (): Promise<void> => {
    const file: string = PathEx.join(makeTemporaryDirectory(), 'missing.yaml');

    const error: ConfigurationError = await expectRejection((): Promise<unknown> => reader.readFile(file), ConfigurationError);
    expect(error.message).to.equal(`unable to read provider configuration file: ${file}`);
  });
});
