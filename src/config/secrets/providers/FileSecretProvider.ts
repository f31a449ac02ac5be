import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';
import { errorMessage } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/logger.js';

const log = createLogger('FileSecretProvider');

/**
 * Resolves secrets from files named after the secret, e.g. Docker or
 * Kubernetes secrets mounted under /run/secrets.
 */
export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = secretDir;
  }

  public async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || logicalName.startsWith('/')) {
      return undefined;
    }

    const filePath = path.join(this.secretDir, logicalName);

    // Resolved path must stay inside secretDir
    if (!path.resolve(filePath).startsWith(path.resolve(this.secretDir) + path.sep)) {
      return undefined;
    }

    try {
      const secretValue = await fs.readFile(filePath, 'utf-8');
      // Files often end with a newline from echo/heredoc
      return secretValue.trim();
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT' && code !== 'EACCES') {
        log.warn(`Unexpected error reading ${filePath}: ${errorMessage(error)}`);
      }
      return undefined;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}
