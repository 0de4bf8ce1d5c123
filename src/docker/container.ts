import Docker from 'dockerode';
import { PassThrough } from 'stream';

export interface MountConfig {
  hostPath: string;
  containerPath: string;
}

export interface RunCommandOptions {
  workDir: string;
  mounts?: MountConfig[];
  env?: Record<string, string>;
  /** CPU limit for the container, in cores. */
  cpus?: number;
}

export interface CommandResult {
  exitCode: number;
  /** stdout and stderr interleaved in arrival order */
  output: string;
}

/** Anything able to run a command to completion inside a container. */
export interface ContainerExecutor {
  /** Makes `image` available locally, pulling it when it is missing. */
  ensureImage(image: string): Promise<void>;
  runCommand(
    image: string,
    command: string[],
    options: RunCommandOptions,
  ): Promise<CommandResult>;
}

export class ContainerManager implements ContainerExecutor {
  private docker: Docker;

  constructor(socketPath: string = '/var/run/docker.sock') {
    this.docker = new Docker({ socketPath });
  }

  async runCommand(
    image: string,
    command: string[],
    options: RunCommandOptions,
  ): Promise<CommandResult> {
    // Prepare mounts (binds)
    const binds: string[] = [];
    if (options.mounts) {
      for (const mount of options.mounts) {
        binds.push(`${mount.hostPath}:${mount.containerPath}:rw`);
      }
    }

    // Prepare environment variables
    const envArray: string[] = [];
    if (options.env) {
      for (const [key, value] of Object.entries(options.env)) {
        envArray.push(`${key}=${value}`);
      }
    }

    const container = await this.docker.createContainer({
      Image: image,
      Cmd: command,
      Tty: false,
      AttachStdout: true,
      AttachStderr: true,
      WorkingDir: options.workDir,
      Env: envArray.length > 0 ? envArray : undefined,
      HostConfig: {
        Binds: binds,
        AutoRemove: false, // We'll remove manually after getting output
        NanoCpus:
          options.cpus !== undefined
            ? Math.round(options.cpus * 1e9)
            : undefined,
      },
    });

    try {
      // Attach to streams before starting
      const stream = await container.attach({
        stream: true,
        stdout: true,
        stderr: true,
      });

      let output = '';
      const combined = new PassThrough();
      combined.on('data', (chunk: Buffer) => {
        output += chunk.toString();
      });

      this.docker.modem.demuxStream(stream, combined, combined);

      await container.start();
      const waitResult = await container.wait();

      // Give streams a moment to flush
      await new Promise((resolve) => setTimeout(resolve, 100));

      return {
        exitCode: waitResult.StatusCode,
        output,
      };
    } finally {
      // Ignore removal errors; the outcome is already settled
      await container.remove({ force: true }).catch(() => undefined);
    }
  }

  async ensureImage(image: string): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
    } catch (error) {
      if (!isNotFound(error)) throw error;
      await this.pullImage(image);
    }
  }

  private async pullImage(image: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.docker.pull(
        image,
        (err: Error | null, stream: NodeJS.ReadableStream) => {
          if (err) {
            reject(err);
            return;
          }

          this.docker.modem.followProgress(stream, (err) => {
            if (err) {
              reject(err);
            } else {
              resolve();
            }
          });
        },
      );
    });
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    error.statusCode === 404
  );
}
