// SPDX-License-Identifier: Apache-2.0

import {spawn} from 'node:child_process';
import {type Readable} from 'node:stream';
import {HelmExecutionError} from '../errors/helm-execution-error.js';
import {IllegalStateError} from '../../../business/errors/illegal-state-error.js';
import {type ProviderLogger} from '../../../core/logging/provider-logger.js';

/**
 * The parts of a child process a helm execution relies on.
 */
export interface HelmProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  on(event: 'close', listener: (code: number | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type HelmProcessSpawner = (
  command: string,
  arguments_: string[],
  options: {env: NodeJS.ProcessEnv},
) => HelmProcess;

const spawnProcess: HelmProcessSpawner = (
  command: string,
  arguments_: string[],
  options: {env: NodeJS.ProcessEnv},
): HelmProcess => spawn(command, arguments_, {env: options.env});

/**
 * A helm command ready to run. The process is started by {@link HelmExecution.call}.
 */
export class HelmExecution {
  private readonly output: string[] = [];
  private readonly errorOutput: string[] = [];
  private exitCodeValue: number | null = null;
  private started: boolean = false;

  /**
   * @param command - the executable followed by its arguments
   * @param environment - the complete environment of the helm process
   * @param logger - receives the command line
   * @param spawner - starts the process
   */
  public constructor(
    public readonly command: readonly string[],
    public readonly environment: Readonly<Record<string, string>>,
    private readonly logger: ProviderLogger,
    private readonly spawner: HelmProcessSpawner = spawnProcess,
  ) {}

  /**
   * Runs the command to completion.
   *
   * @throws HelmExecutionError - when the process cannot be started or exits with a non-zero code
   * @throws IllegalStateError - when called a second time
   */
  public async call(): Promise<void> {
    if (this.started) {
      throw new IllegalStateError('helm execution has already been started');
    }
    this.started = true;

    const [executable, ...arguments_] = this.command;
    this.logger.debug(`Executing: ${this.command.join(' ')}`);

    const child: HelmProcess = this.spawner(executable, arguments_, {env: {...this.environment}});

    await new Promise<void>((resolve, reject): void => {
      child.stdout.on('data', (chunk: Buffer | string): void => {
        this.output.push(chunk.toString());
      });
      child.stderr.on('data', (chunk: Buffer | string): void => {
        this.errorOutput.push(chunk.toString());
      });
      child.on('error', (error: Error): void => {
        reject(new HelmExecutionError(-1, `failed to start ${executable}: ${error.message}`, '', '', error));
      });
      child.on('close', (code: number | null): void => {
        this.exitCodeValue = code;
        if (code === 0) {
          resolve();
          return;
        }
        reject(
          new HelmExecutionError(
            code ?? 1,
            `Process exited with code ${code}: ${this.standardError().trim()}`,
            this.standardOutput(),
            this.standardError(),
          ),
        );
      });
    });
  }

  /**
   * @returns the exit code, or null while the process has not completed
   */
  public exitCode(): number | null {
    return this.exitCodeValue;
  }

  public standardOutput(): string {
    return this.output.join('');
  }

  public standardError(): string {
    return this.errorOutput.join('');
  }
}
