import * as fs from 'fs';
import type { RunnerInvocation, RunnerOutcome, TestRunner } from '../types.js';
import type { CommandResult, ContainerExecutor } from '../docker/container.js';
import { LaunchError, errorMessage } from '../errors.js';
import { buildGoTestArgs } from './go-test-runner.js';

const CONTAINER_WORKSPACE = '/workspace';

export interface ContainerTestRunnerOptions {
  executor: ContainerExecutor;
  image: string;
  /** Host directory mounted as the container's workspace. */
  hostRoot: string;
  cpusPerJob?: number;
}

/**
 * Runs `go test -fuzz` for one target inside a throwaway container with the
 * module root mounted at /workspace.
 */
export class ContainerTestRunner implements TestRunner {
  constructor(private readonly options: ContainerTestRunnerOptions) {}

  async prepare(): Promise<void> {
    const { executor, image } = this.options;
    try {
      await executor.ensureImage(image);
    } catch (error) {
      throw new LaunchError(
        `Could not pull image ${image}: ${errorMessage(error)}`,
        'docker',
      );
    }
  }

  async run(invocation: RunnerInvocation): Promise<RunnerOutcome> {
    const { executor, image, hostRoot } = this.options;
    const command = [
      'go',
      ...buildGoTestArgs(invocation.target, invocation.durationSeconds),
    ];

    let result: CommandResult;
    try {
      result = await executor.runCommand(image, command, {
        workDir: CONTAINER_WORKSPACE,
        mounts: [{ hostPath: hostRoot, containerPath: CONTAINER_WORKSPACE }],
        env: invocation.env,
        cpus: this.options.cpusPerJob,
      });
    } catch (error) {
      throw new LaunchError(
        `Could not run container ${image}: ${errorMessage(error)}`,
        'docker',
      );
    }

    await fs.promises.appendFile(invocation.logPath, result.output);
    return { exitCode: result.exitCode };
  }
}
