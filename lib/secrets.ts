import { promises as fs } from 'fs';
import path from 'path';
import { SecretsError, errorMessage } from './errors';
import { CommandResult, isSpawnNotFound, runCommand } from './process';

export interface SecretsCallOptions {
  signal?: AbortSignal;
}

export interface SecretsAdapter {
  isEncrypted(filePath: string): Promise<boolean>;
  decrypt(filePath: string, destPath: string, options?: SecretsCallOptions): Promise<void>;
}

export interface SopsSecretsAdapterOptions {
  binary?: string;
  // Exported to sops as SOPS_AGE_KEY_FILE
  ageKeyFile?: string;
}

const MISSING_KEY_PATTERNS = [
  'failed to get the data key',
  'no key could be found',
  'could not decrypt',
  'no identity matched',
  'failed to load age identities',
];

/**
 * Decrypts SOPS files (YAML, JSON or dotenv) with the `sops` CLI.
 */
export class SopsSecretsAdapter implements SecretsAdapter {
  private binary: string;
  private ageKeyFile?: string;

  constructor(options: SopsSecretsAdapterOptions = {}) {
    this.binary = options.binary ?? 'sops';
    this.ageKeyFile = options.ageKeyFile;
  }

  async isEncrypted(filePath: string): Promise<boolean> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch {
      return false;
    }
    // YAML/JSON carry a `sops` metadata key, dotenv files `sops_*` entries
    return content.includes('sops:') || content.includes('"sops"') || /^sops_version=/m.test(content);
  }

  async decrypt(filePath: string, destPath: string, options: SecretsCallOptions = {}): Promise<void> {
    const env: NodeJS.ProcessEnv = { ...process.env };
    if (this.ageKeyFile) env.SOPS_AGE_KEY_FILE = this.ageKeyFile;

    let result: CommandResult;
    try {
      result = await runCommand(this.binary, ['--decrypt', filePath], { env, signal: options.signal });
    } catch (error) {
      if (isSpawnNotFound(error)) {
        throw new SecretsError('binary-unavailable', `${this.binary} executable not found`);
      }
      throw new SecretsError('binary-unavailable', `Failed to run ${this.binary}: ${errorMessage(error)}`);
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      const lowered = stderr.toLowerCase();
      const kind = MISSING_KEY_PATTERNS.some((pattern) => lowered.includes(pattern)) ? 'missing-key' : 'malformed';
      throw new SecretsError(kind, `sops exited with code ${result.exitCode}: ${stderr}`);
    }

    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await fs.writeFile(destPath, result.stdout, { mode: 0o600 });
  }
}
