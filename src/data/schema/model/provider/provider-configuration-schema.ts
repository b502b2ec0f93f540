// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {IsBoolean, IsObject, IsOptional, IsString, ValidateNested} from 'class-validator';
import {KubernetesConfigurationSchema} from './kubernetes-configuration-schema.js';
import {type ProviderConfiguration} from './provider-configuration.js';

/**
 * File representation of the provider block, keyed by the snake_case names of the declarative configuration.
 */
@Exclude()
export class ProviderConfigurationSchema implements ProviderConfiguration {
  @Expose()
  @IsOptional()
  @IsBoolean()
  public debug?: boolean;

  @Expose({name: 'plugins_path'})
  @IsOptional()
  @IsString()
  public pluginsPath?: string;

  @Expose({name: 'registry_config_path'})
  @IsOptional()
  @IsString()
  public registryConfigPath?: string;

  @Expose({name: 'repository_config_path'})
  @IsOptional()
  @IsString()
  public repositoryConfigPath?: string;

  @Expose({name: 'repository_cache'})
  @IsOptional()
  @IsString()
  public repositoryCache?: string;

  @Expose({name: 'helm_driver'})
  @IsOptional()
  @IsString()
  public helmDriver?: string;

  @Expose()
  @Type((): typeof KubernetesConfigurationSchema => KubernetesConfigurationSchema)
  @IsOptional()
  @IsObject()
  @ValidateNested()
  public kubernetes?: KubernetesConfigurationSchema;
}
