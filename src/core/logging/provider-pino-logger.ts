// SPDX-License-Identifier: Apache-2.0

import pino, {type Logger as PinoLogger, type TransportTargetOptions} from 'pino';
import {mkdirSync} from 'node:fs';
import {v4 as uuidv4} from 'uuid';
// eslint-disable-next-line unicorn/import-style
import * as util from 'node:util';
import chalk from 'chalk';
import * as constants from '../constants.js';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type ProviderLogger} from './provider-logger.js';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

interface ErrorFrame {
  message: string;
  stacktrace?: string;
}

const MAX_CAUSE_DEPTH: number = 10;

/**
 * Pino-based implementation of the ProviderLogger interface.
 *
 * Emits two files under constants.PROVIDER_LOGS_DIR:
 *  - helm-provider.ndjson : newline-delimited JSON (authoritative)
 *  - helm-provider.log    : pretty human-readable
 */
@injectable()
export class ProviderPinoLogger implements ProviderLogger {
  protected readonly pinoLogger: PinoLogger;
  private traceId?: string;
  private developmentMode: boolean;

  /**
   * @param logLevel - the log level to use (fatal|error|warn|info|debug|trace)
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - where the log files are written
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    const level: string = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    logsDirectory = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);

    this.nextTraceId();

    mkdirSync(logsDirectory, {recursive: true});

    const ndjsonTarget: TransportTargetOptions = {
      target: 'pino/file',
      level,
      options: {destination: PathEx.join(logsDirectory, `${constants.PROVIDER_LOG_FILE_BASENAME}.ndjson`)},
    };

    const prettyTarget: TransportTargetOptions = {
      target: 'pino-pretty',
      level,
      options: {
        destination: PathEx.join(logsDirectory, `${constants.PROVIDER_LOG_FILE_BASENAME}.log`),
        translateTime: 'HH:MM:ss.l',
        colorize: false,
        messageKey: 'msg',
        messageFormat: '{msg} [traceId="{traceId}"]',
        ignore: 'pid,hostname,traceId',
        crlf: false,
      },
    };

    const transport: pino.ThreadStream = pino.transport({targets: [ndjsonTarget, prettyTarget]});

    this.pinoLogger = pino(
      {
        level,
        mixin: (): {traceId?: string} => (this.traceId ? {traceId: this.traceId} : {}),
        // credentials may appear inside resolved client configs
        redact: {
          paths: ['*.token', '*.password', '*.clientKey', '*.authorization'],
          censor: '[REDACTED]',
        },
      },
      transport,
    );
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    return {...meta, traceId: this.traceId};
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    const formatted: string = util.format(message, ...arguments_);
    console.log(formatted);
    this.info(formatted);
  }

  public showUserError(error: unknown): void {
    const frames: ErrorFrame[] = ProviderPinoLogger.collectFrames(error);

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix: string = '';
      let indent: string = '';
      for (const frame of frames) {
        console.log(indent + prefix + chalk.yellow(frame.message));
        if (frame.stacktrace) {
          const formatted: string = frame.stacktrace
            .split('\n')
            .filter((line: string): boolean => !line.includes('node:internal'))
            .join('\n')
            .trim();
          console.log(indent + chalk.gray(formatted) + '\n');
        }
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of frames[0].message.split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.toPino('error', error, []);
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('error', message, arguments_);
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('warn', message, arguments_);
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('info', message, arguments_);
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('debug', message, arguments_);
  }

  private static collectFrames(error: unknown): ErrorFrame[] {
    if (!(error instanceof Error)) {
      return [{message: String(error)}];
    }

    const frames: ErrorFrame[] = [{message: error.message, stacktrace: error.stack}];
    let cause: unknown = error.cause;
    let depth: number = 0;
    while (cause instanceof Error && depth < MAX_CAUSE_DEPTH) {
      frames.push({message: cause.message, stacktrace: cause.stack});
      cause = cause.cause;
      depth += 1;
    }
    return frames;
  }

  private toPino(level: LogLevel, message: unknown, arguments_: unknown[]): void {
    const meta: Record<string, unknown> = this.prepMeta();

    if (message instanceof Error) {
      this.pinoLogger[level]({...meta, err: message}, message.message);
      return;
    }

    if (message !== null && typeof message === 'object') {
      const object: Record<string, unknown> = {...meta, ...message};
      if (arguments_.length > 0) {
        this.pinoLogger[level](object, util.format('%s', ...arguments_));
      } else {
        this.pinoLogger[level](object);
      }
      return;
    }

    this.pinoLogger[level](meta, util.format(message, ...arguments_));
  }
}
