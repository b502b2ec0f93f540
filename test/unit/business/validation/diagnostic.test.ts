// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {Diagnostic, DiagnosticCode, DiagnosticSeverity} from '../../../../src/business/validation/diagnostic.js';
import {DriverInvalidError} from '../../../../src/business/errors/driver-invalid-error.js';
import {ConfigurationError} from '../../../../src/data/configuration/api/configuration-error.js';

describe('Diagnostic', (): void => {
  it('should carry the fields of a diagnosable error', (): void => {
    const diagnostic: Diagnostic = Diagnostic.fromError(new DriverInvalidError('redis'));

    expect(diagnostic.severity).to.equal(DiagnosticSeverity.ERROR);
    expect(diagnostic.code).to.equal(DiagnosticCode.DRIVER_INVALID);
    expect(diagnostic.summary).to.equal('Invalid storage driver: redis used for helm_driver');
    expect(diagnostic.detail).to.equal(
      'Helm backend storage driver must be set to one of the following values: memory, configmap, secret, sql',
    );
  });

  it('should report other errors as invalid configuration', (): void => {
    const diagnostic: Diagnostic = Diagnostic.fromError(
      new ConfigurationError('unable to load kubeconfig file: /a', new Error('bad indentation')),
    );

    expect(diagnostic.code).to.equal(DiagnosticCode.CONFIGURATION_INVALID);
    expect(diagnostic.summary).to.equal('unable to load kubeconfig file: /a');
    expect(diagnostic.detail).to.equal('bad indentation');
  });

  it('should report non-error values as invalid configuration', (): void => {
    expect(Diagnostic.fromError('failed').summary).to.equal('failed');
  });

  it('should only count error severities', (): void => {
    const warning: Diagnostic = Diagnostic.warning(DiagnosticCode.CONFIGURATION_INVALID, 'deprecated field');

    expect(Diagnostic.hasErrors([warning])).to.be.false;
    expect(Diagnostic.hasErrors([warning, Diagnostic.error(DiagnosticCode.DRIVER_INVALID, 'bad')])).to.be.true;
    expect(Diagnostic.hasErrors([])).to.be.false;
  });
});
