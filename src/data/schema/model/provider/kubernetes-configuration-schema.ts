// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {ArrayMaxSize, IsArray, IsBoolean, IsOptional, IsString, ValidateNested} from 'class-validator';
import {ExecConfigurationSchema} from './exec-configuration-schema.js';
import {type KubernetesConfiguration} from './provider-configuration.js';

@Exclude()
export class KubernetesConfigurationSchema implements KubernetesConfiguration {
  @Expose()
  @IsOptional()
  @IsString()
  public host?: string;

  @Expose()
  @IsOptional()
  @IsString()
  public username?: string;

  @Expose()
  @IsOptional()
  @IsString()
  public password?: string;

  @Expose()
  @IsOptional()
  @IsBoolean()
  public insecure?: boolean;

  @Expose({name: 'client_certificate'})
  @IsOptional()
  @IsString()
  public clientCertificate?: string;

  @Expose({name: 'client_key'})
  @IsOptional()
  @IsString()
  public clientKey?: string;

  @Expose({name: 'cluster_ca_certificate'})
  @IsOptional()
  @IsString()
  public clusterCaCertificate?: string;

  @Expose({name: 'config_paths'})
  @IsOptional()
  @IsArray()
  @IsString({each: true})
  public configPaths?: string[];

  @Expose({name: 'config_path'})
  @IsOptional()
  @IsString()
  public configPath?: string;

  @Expose({name: 'config_context'})
  @IsOptional()
  @IsString()
  public configContext?: string;

  @Expose({name: 'config_context_auth_info'})
  @IsOptional()
  @IsString()
  public configContextAuthInfo?: string;

  @Expose({name: 'config_context_cluster'})
  @IsOptional()
  @IsString()
  public configContextCluster?: string;

  @Expose()
  @IsOptional()
  @IsString()
  public token?: string;

  @Expose()
  @Type((): typeof ExecConfigurationSchema => ExecConfigurationSchema)
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(1)
  @ValidateNested({each: true})
  public exec?: ExecConfigurationSchema[];
}
