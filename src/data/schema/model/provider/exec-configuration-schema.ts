// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import {IsArray, IsObject, IsOptional, IsString} from 'class-validator';
import {type ExecConfiguration} from './provider-configuration.js';

@Exclude()
export class ExecConfigurationSchema implements ExecConfiguration {
  @Expose({name: 'api_version'})
  @IsOptional()
  @IsString()
  public apiVersion: string;

  @Expose()
  @IsOptional()
  @IsString()
  public command: string;

  @Expose()
  @IsOptional()
  @IsArray()
  @IsString({each: true})
  public args: string[];

  @Expose()
  @IsOptional()
  @IsObject()
  public env: Record<string, string>;

  public constructor(apiVersion?: string, command?: string, args?: string[], env?: Record<string, string>) {
    this.apiVersion = apiVersion ?? '';
    this.command = command ?? '';
    this.args = args ?? [];
    this.env = env ?? {};
  }
}
