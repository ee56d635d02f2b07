import { Client, FTPError } from 'basic-ftp';

import { UploadError, errorMessage } from './errors.js';
import type { FtpTarget, UploadSession } from './types.js';

export class FtpClient implements UploadSession {
  private readonly client: Client;

  constructor(private readonly config: FtpTarget) {
    this.client = new Client(config.timeoutMs);
    this.client.ftp.verbose = false;
  }

  async connect(): Promise<void> {
    try {
      await this.client.access({
        host: this.config.host,
        port: this.config.port,
        user: this.config.user,
        password: this.config.password,
        secure: this.config.secure,
      });
    } catch (error) {
      // 530 is "Not logged in"
      const code = error instanceof FTPError && error.code === 530 ? 'AUTH_ERROR' : 'CONNECTION_ERROR';
      throw new UploadError(`Could not connect to ${this.config.host} as ${this.config.user}: ${errorMessage(error)}`, code, {
        cause: error,
      });
    }
  }

  async changeDirectory(remotePath: string): Promise<void> {
    try {
      await this.client.cd(remotePath);
    } catch (error) {
      throw new UploadError(`Could not change to directory ${remotePath}: ${errorMessage(error)}`, 'DIRECTORY_ERROR', {
        cause: error,
      });
    }
  }

  async uploadFile(localPath: string, remoteName: string): Promise<void> {
    try {
      await this.client.uploadFrom(localPath, remoteName);
    } catch (error) {
      throw new UploadError(`Could not upload ${localPath} as ${remoteName}: ${errorMessage(error)}`, 'TRANSFER_ERROR', {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    this.client.close();
  }
}
