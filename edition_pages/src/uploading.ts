import process from 'process';

import { createUploadSession } from './clientFactory.js';
import { UploadError, errorMessage } from './errors.js';
import { moduleLogger } from './logger.js';
import type { Page } from './page.js';
import type { Logger } from 'pino';

import type { SendPagesOptions, UploadReport, UploadSession, UploadTarget, UploadedPage } from './types.js';

export type FtpUploadOptions = SendPagesOptions & {
  host: string;
  user: string;
  password?: string;
  port?: number;
  secure?: boolean;
  timeoutMs?: number;
};

export type SftpUploadOptions = SendPagesOptions & {
  host: string;
  user: string;
  /** Without a password, key authentication is used. */
  password?: string;
  port?: number;
  privateKey?: string;
  passphrase?: string;
  agent?: string;
  timeoutMs?: number;
};

const defaultTimeoutMs = 10000;

function targetUser(target: UploadTarget): string {
  return target.protocol === 'ftp' ? target.user : target.username;
}

// A failed disconnect never overrides the outcome of the upload itself.
async function closeSession(session: UploadSession, log: Logger): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    log.warn({ err: error }, 'Closing the connection failed: %s', errorMessage(error));
  }
}

/**
 * Upload pages over one connection to `target`.
 *
 * Pages go up in the order given, named by `externalName()` unless `rename`
 * is false. Without `options.path` the target's `remoteRoot` is used. Any
 * failure closes the connection and is rethrown as an `UploadError` carrying
 * the pages already sent.
 */
export async function sendPages(
  pages: Iterable<Page>,
  target: UploadTarget,
  options: SendPagesOptions = {},
): Promise<UploadReport> {
  const log = moduleLogger('uploading', options.logger);
  const rename = options.rename ?? true;
  const session = (options.sessionFactory ?? createUploadSession)(target);
  const uploaded: UploadedPage[] = [];
  const remotePath = options.path ?? target.remoteRoot;

  try {
    await session.connect();
    log.debug({ host: target.host, user: targetUser(target) }, 'Connected to %s as %s', target.host, targetUser(target));

    if (remotePath !== undefined) {
      await session.changeDirectory(remotePath);
      log.debug('Changed to directory %s', remotePath);
    }

    for (const page of pages) {
      const remoteName = rename ? page.externalName({ publicationCode: options.publicationCode }) : page.name;
      log.debug('Opened %s for uploading', page.path);
      await session.uploadFile(page.path, remoteName);
      uploaded.push({ page, remoteName });
      log.info('Uploaded file: %s -> %s', page.name, remoteName);
    }
  } catch (error) {
    log.error({ err: error }, '%s uploading encountered an error: %s', target.protocol.toUpperCase(), errorMessage(error));
    if (error instanceof UploadError) {
      throw new UploadError(error.message, error.code, { cause: error.cause, uploaded });
    }
    throw new UploadError(errorMessage(error), 'TRANSFER_ERROR', { cause: error, uploaded });
  } finally {
    await closeSession(session, log);
  }

  return { host: target.host, uploaded };
}

/** Upload pages to an FTP server. */
export async function sendPagesFtp(pages: Iterable<Page>, options: FtpUploadOptions): Promise<UploadReport> {
  const { host, user, password = '', port = 21, secure = false, timeoutMs = defaultTimeoutMs, ...sendOptions } = options;
  return sendPages(pages, { protocol: 'ftp', host, port, user, password, secure, timeoutMs }, sendOptions);
}

/** Upload pages to an SFTP server. */
export async function sendPagesSftp(pages: Iterable<Page>, options: SftpUploadOptions): Promise<UploadReport> {
  const {
    host,
    user,
    password,
    port = 22,
    privateKey,
    passphrase,
    agent = password === undefined ? process.env.SSH_AUTH_SOCK : undefined,
    timeoutMs = defaultTimeoutMs,
    ...sendOptions
  } = options;
  return sendPages(
    pages,
    { protocol: 'sftp', host, port, username: user, password, privateKey, passphrase, agent, timeoutMs },
    sendOptions,
  );
}
