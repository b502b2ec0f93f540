// SPDX-License-Identifier: Apache-2.0

import {HelmExecution} from './helm-execution.js';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type ProviderLogger} from '../../../core/logging/provider-logger.js';
import {IllegalArgumentError} from '../../../business/errors/illegal-argument-error.js';
import {type HelmRequest} from '../request/helm-request.js';

@injectable()
/**
 * Collects the environment a helm command runs in. The arguments come from the release engine driving helm.
 */
export class HelmExecutionBuilder {
  private readonly logger: ProviderLogger;
  private readonly helmExecutable: string;
  private readonly environmentVariables: Map<string, string> = new Map();

  public constructor(
    @inject(InjectTokens.ProviderLogger) logger?: ProviderLogger,
    @inject(InjectTokens.HelmExecutable) helmExecutable?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.ProviderLogger, this.constructor.name);
    this.helmExecutable = patchInject(helmExecutable, InjectTokens.HelmExecutable, this.constructor.name);
  }

  /**
   * Applies each request to this builder, in order.
   */
  public request(...requests: HelmRequest[]): HelmExecutionBuilder {
    for (const request of requests) {
      request.apply(this);
    }
    return this;
  }

  public environmentVariable(name: string, value: string): HelmExecutionBuilder {
    if (!name) {
      throw new IllegalArgumentError('name must not be null', name);
    }
    if (!value) {
      throw new IllegalArgumentError('value must not be null', value);
    }
    this.environmentVariables.set(name, value);
    return this;
  }

  /**
   * @param arguments_ - passed to helm as given
   * @param baseEnvironment - variables inherited by the helm process, the current process environment by default
   */
  public build(arguments_: readonly string[], baseEnvironment: NodeJS.ProcessEnv = process.env): HelmExecution {
    const command: string[] = [this.helmExecutable, ...arguments_];
    const environment: Record<string, string> = {};
    for (const [key, value] of Object.entries(baseEnvironment)) {
      if (value !== undefined) {
        environment[key] = value;
      }
    }
    for (const [key, value] of this.environmentVariables.entries()) {
      environment[key] = value;
    }

    this.logger.debug(`Helm command: helm ${arguments_.join(' ')}`);
    return new HelmExecution(command, environment, this.logger);
  }
}
