import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import SftpClientLib from 'ssh2-sftp-client';

import { UploadError, errorMessage } from './errors.js';
import type { SftpTarget, UploadSession } from './types.js';

const defaultKeyFiles = ['id_ed25519', 'id_ecdsa', 'id_rsa'];

async function readDefaultPrivateKey(): Promise<string | undefined> {
  for (const name of defaultKeyFiles) {
    const keyPath = path.join(os.homedir(), '.ssh', name);
    try {
      return await fs.readFile(keyPath, 'utf8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }
  }
  return undefined;
}

function isAuthFailure(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return message.includes('authentication') || message.includes('publickey') || message.includes('password');
}

export class SftpClient implements UploadSession {
  private readonly client = new SftpClientLib();
  private remoteDir = '.';
  private connected = false;

  constructor(private readonly config: SftpTarget) {}

  /** Password when given, otherwise the configured key or the user's default key plus any agent. */
  private async credentials(): Promise<{ password?: string; privateKey?: string; passphrase?: string; agent?: string }> {
    if (this.config.password !== undefined) {
      return { password: this.config.password };
    }
    return {
      privateKey: this.config.privateKey ?? (await readDefaultPrivateKey()),
      passphrase: this.config.passphrase,
      agent: this.config.agent,
    };
  }

  async connect(): Promise<void> {
    try {
      const credentials = await this.credentials();
      await this.client.connect({
        host: this.config.host,
        port: this.config.port,
        username: this.config.username,
        readyTimeout: this.config.timeoutMs,
        ...credentials,
      });
      this.connected = true;
      this.remoteDir = await this.client.cwd();
    } catch (error) {
      throw new UploadError(
        `Could not connect to ${this.config.host} as ${this.config.username}: ${errorMessage(error)}`,
        isAuthFailure(error) ? 'AUTH_ERROR' : 'CONNECTION_ERROR',
        { cause: error },
      );
    }
  }

  async changeDirectory(remotePath: string): Promise<void> {
    const target = path.posix.resolve(this.remoteDir, remotePath);
    let kind: false | string;
    try {
      kind = await this.client.exists(target);
    } catch (error) {
      throw new UploadError(`Could not change to directory ${remotePath}: ${errorMessage(error)}`, 'DIRECTORY_ERROR', {
        cause: error,
      });
    }
    if (kind !== 'd') {
      throw new UploadError(`Could not change to directory ${remotePath}: not a directory`, 'DIRECTORY_ERROR');
    }
    this.remoteDir = target;
  }

  async uploadFile(localPath: string, remoteName: string): Promise<void> {
    const remotePath = path.posix.join(this.remoteDir, remoteName);
    try {
      await this.client.put(localPath, remotePath);
    } catch (error) {
      throw new UploadError(`Could not upload ${localPath} as ${remoteName}: ${errorMessage(error)}`, 'TRANSFER_ERROR', {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    await this.client.end();
  }
}
