import { promises as fs } from 'fs';
import path from 'path';
import { ContainerError, PruneError, errorMessage } from './errors';
import { CommandResult, isSpawnNotFound, runCommand } from './process';

export interface BringUpOptions {
  // Becomes COMPOSE_PROJECT_NAME so containers can be found again by label
  projectName: string;
  onOutput?: (chunk: string) => void;
  signal?: AbortSignal;
}

export interface BringUpResult {
  exitCode: number;
}

export interface ContainerAdapter {
  bringUp(projectDir: string, options: BringUpOptions): Promise<BringUpResult>;
  pruneImages(): Promise<void>;
  tailLogs(containerId: string, lines: number): Promise<string>;
}

const COMPOSE_FILES = ['docker-compose.yml', 'docker-compose.yaml', 'compose.yaml', 'compose.yml'];

export async function findComposeFile(projectDir: string): Promise<string> {
  for (const file of COMPOSE_FILES) {
    try {
      await fs.access(path.join(projectDir, file));
      return file;
    } catch {
      // try the next name
    }
  }
  return COMPOSE_FILES[0];
}

/**
 * Container adapter driving the `docker compose` CLI.
 */
export class DockerComposeAdapter implements ContainerAdapter {
  constructor(private binary: string = 'docker') {}

  async bringUp(projectDir: string, options: BringUpOptions): Promise<BringUpResult> {
    const composeFile = await findComposeFile(projectDir);
    options.onOutput?.(`$ ${this.binary} compose -f ${composeFile} up -d --remove-orphans\n`);

    try {
      const { exitCode } = await runCommand(
        this.binary,
        ['compose', '-f', composeFile, 'up', '-d', '--remove-orphans'],
        {
          cwd: projectDir,
          env: { ...process.env, COMPOSE_PROJECT_NAME: options.projectName },
          signal: options.signal,
          onOutput: options.onOutput,
          captureStdout: false,
        },
      );
      return { exitCode };
    } catch (error) {
      if (isSpawnNotFound(error)) {
        throw new ContainerError('nonzero-exit', `${this.binary} executable not found`, 127);
      }
      throw error;
    }
  }

  async pruneImages(): Promise<void> {
    let result: CommandResult;
    try {
      result = await runCommand(this.binary, ['image', 'prune', '-f']);
    } catch (error) {
      throw new PruneError(`Image prune could not start: ${errorMessage(error)}`);
    }
    if (result.exitCode !== 0) {
      throw new PruneError(`Image prune exited with code ${result.exitCode}: ${result.stderr.trim()}`);
    }
  }

  async tailLogs(containerId: string, lines: number): Promise<string> {
    if (!Number.isInteger(lines) || lines <= 0) {
      throw new Error('lines must be a positive integer');
    }
    const chunks: string[] = [];
    const result = await runCommand(this.binary, ['logs', '--tail', String(lines), containerId], {
      onOutput: (chunk) => chunks.push(chunk),
      captureStdout: false,
    });
    if (result.exitCode !== 0) {
      throw new Error(`docker logs exited with code ${result.exitCode}: ${result.stderr.trim()}`);
    }
    return chunks.join('');
  }
}
