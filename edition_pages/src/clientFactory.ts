import { FtpClient } from './ftpClient.js';
import { SftpClient } from './sftpClient.js';
import type { UploadSession, UploadTarget } from './types.js';

export function createUploadSession(target: UploadTarget): UploadSession {
  if (target.protocol === 'sftp') {
    return new SftpClient(target);
  }

  return new FtpClient(target);
}
