import type { Logger } from 'pino';

import type { Page } from './page.js';

export type PageType = 'indd' | 'pdf';

/** A single page, or a left-hand/right-hand spread. */
export type PageNumbers = readonly [number] | readonly [number, number];

export type ParsedPageName = {
  prefix: string;
  pages: PageNumbers;
  section: string;
  date: Date;
  type: PageType;
};

export type PageComparisonKeys = [date: Date, type: PageType, prefix: string, pages: PageNumbers, section: string];

export type TransferProtocol = 'ftp' | 'sftp';

export type FtpTarget = {
  protocol: 'ftp';
  host: string;
  port: number;
  user: string;
  password: string;
  secure: boolean;
  timeoutMs: number;
  /** Default remote directory when `SendPagesOptions.path` is not given. */
  remoteRoot?: string;
};

export type SftpTarget = {
  protocol: 'sftp';
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: string;
  passphrase?: string;
  agent?: string;
  timeoutMs: number;
  remoteRoot?: string;
};

export type UploadTarget = FtpTarget | SftpTarget;

/** One open connection to a remote server. */
export interface UploadSession {
  connect(): Promise<void>;
  changeDirectory(remotePath: string): Promise<void>;
  uploadFile(localPath: string, remoteName: string): Promise<void>;
  close(): Promise<void>;
}

export type UploadSessionFactory = (target: UploadTarget) => UploadSession;

export type UploadedPage = {
  page: Page;
  remoteName: string;
};

export type UploadReport = {
  host: string;
  uploaded: UploadedPage[];
};

export type SendPagesOptions = {
  /** Remote directory, or chain of directories, to change into first. */
  path?: string;
  /** Upload under `page.externalName()` instead of the current filename. */
  rename?: boolean;
  publicationCode?: string;
  logger?: Logger;
  sessionFactory?: UploadSessionFactory;
};
