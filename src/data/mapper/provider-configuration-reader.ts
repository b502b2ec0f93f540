// SPDX-License-Identifier: Apache-2.0

import {readFile} from 'node:fs/promises';
import yaml from 'yaml';
import {plainToInstance} from 'class-transformer';
import {type ValidationError, validateSync} from 'class-validator';
import {injectable} from 'tsyringe-neo';
import {ProviderConfigurationSchema} from '../schema/model/provider/provider-configuration-schema.js';
import {type ProviderConfiguration} from '../schema/model/provider/provider-configuration.js';
import {ConfigurationError} from '../configuration/api/configuration-error.js';

/**
 * Reads the provider block from YAML documents.
 */
@injectable()
export class ProviderConfigurationReader {
  public async readFile(filePath: string): Promise<ProviderConfiguration> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`unable to read provider configuration file: ${filePath}`, error);
    }
    return this.parse(text, filePath);
  }

  public parse(text: string, source: string = '<inline>'): ProviderConfiguration {
    let document: unknown;
    try {
      document = yaml.parse(text);
    } catch (error) {
      throw new ConfigurationError(`provider configuration is not valid YAML: ${source}`, error);
    }

    if (document === null || document === undefined) {
      return new ProviderConfigurationSchema();
    }
    if (typeof document !== 'object' || Array.isArray(document)) {
      throw new ConfigurationError(`provider configuration must be a mapping: ${source}`);
    }

    const configuration: ProviderConfigurationSchema = plainToInstance(ProviderConfigurationSchema, document, {
      excludeExtraneousValues: true,
    });

    const violations: string[] = ProviderConfigurationReader.violations(validateSync(configuration));
    if (violations.length > 0) {
      throw new ConfigurationError(`provider configuration is invalid: ${source}: ${violations.join('; ')}`, undefined, {
        source,
        violations,
      });
    }

    return configuration;
  }

  /**
   * One `path: message` line per failed constraint, nested properties joined with dots.
   */
  private static violations(errors: readonly ValidationError[], parent?: string): string[] {
    const lines: string[] = [];
    for (const error of errors) {
      const path: string = parent ? `${parent}.${error.property}` : error.property;
      for (const message of Object.values(error.constraints ?? {})) {
        lines.push(`${path}: ${message}`);
      }
      lines.push(...ProviderConfigurationReader.violations(error.children ?? [], path));
    }
    return lines;
  }
}
