import fs from 'fs';
import process from 'process';

import { z } from 'zod';

import { expandHome } from './paths.js';
import type { UploadTarget } from './types.js';

const booleanField = z.union([z.string(), z.boolean(), z.undefined()]).transform((value: string | boolean | undefined): boolean => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['0', 'false', 'no', 'off', ''].includes(normalized)) {
      return false;
    }
  }
  return false;
});

const intField = (fallback: number) =>
  z.union([z.string(), z.number(), z.undefined()]).transform((value: string | number | undefined): number => {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === 'string' && value.trim()) {
      const parsed = Number.parseInt(value, 10);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
    return fallback;
  });

const stringField = (fallback: string) =>
  z.union([z.string(), z.undefined()]).transform((value: string | undefined): string => {
    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
    return fallback;
  });

const optionalString = z.union([z.string(), z.undefined()]).transform((value: string | undefined) => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
});

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof logLevels)[number];

const logLevelField = stringField('silent').transform((value): LogLevel => {
  const normalized = value.toLowerCase();
  return logLevels.find((level) => level === normalized) ?? 'silent';
});

const configSchema = z.object({
  PAGES_ROOT: stringField('~/Server/Pages'),
  PAGES_DIR_FORMAT: stringField('yyyy-MM-dd EEEE MMM d'),
  PRESS_PDFS_DIR_FORMAT: stringField("'PDFs' ddMMyy"),
  WEB_PDFS_DIR_FORMAT: stringField("'E-edition PDFs' ddMMyy"),
  PUBLICATION_CODE: stringField('MS'),
  LOG_LEVEL: logLevelField,
  FTP_HOST: stringField('localhost'),
  FTP_PORT: intField(21),
  FTP_USER: stringField('anonymous'),
  FTP_PASSWORD: stringField(''),
  FTP_SECURE: booleanField,
  FTP_PROTOCOL: stringField('ftp').transform((value): 'ftp' | 'sftp' => (value.toLowerCase() === 'sftp' ? 'sftp' : 'ftp')),
  FTP_ROOT: optionalString,
  FTP_TIMEOUT_MS: intField(10000),
  SFTP_HOST: optionalString,
  SFTP_PORT: intField(22),
  SFTP_USERNAME: optionalString,
  SFTP_PASSWORD: optionalString,
  SFTP_PRIVATE_KEY: optionalString,
  SFTP_PRIVATE_KEY_PATH: optionalString,
  SFTP_PASSPHRASE: optionalString,
  SSH_AUTH_SOCK: optionalString,
});

export type EditionLayout = {
  pagesRoot: string;
  pagesDirFormat: string;
  pressPdfsDirFormat: string;
  webPdfsDirFormat: string;
};

export type ServiceConfig = EditionLayout & {
  publicationCode: string;
  logLevel: LogLevel;
  protocol: 'ftp' | 'sftp';
  ftpHost: string;
  ftpPort: number;
  ftpUser: string;
  ftpPassword: string;
  ftpSecure: boolean;
  remoteRoot?: string;
  timeoutMs: number;
  sftpHost: string;
  sftpPort: number;
  sftpUsername: string;
  sftpPassword?: string;
  sftpPrivateKey?: string;
  sftpPassphrase?: string;
  sshAgent?: string;
};

/** A key given by path is read from disk; anything else is taken as the key itself. */
function loadPrivateKey(pathOrValue?: string): string | undefined {
  if (!pathOrValue) {
    return undefined;
  }
  const keyPath = expandHome(pathOrValue);
  if (fs.existsSync(keyPath) && fs.statSync(keyPath).isFile()) {
    return fs.readFileSync(keyPath, 'utf8');
  }
  return pathOrValue;
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const raw = configSchema.parse(env);
  return {
    pagesRoot: expandHome(raw.PAGES_ROOT),
    pagesDirFormat: raw.PAGES_DIR_FORMAT,
    pressPdfsDirFormat: raw.PRESS_PDFS_DIR_FORMAT,
    webPdfsDirFormat: raw.WEB_PDFS_DIR_FORMAT,
    publicationCode: raw.PUBLICATION_CODE,
    logLevel: raw.LOG_LEVEL,
    protocol: raw.FTP_PROTOCOL,
    ftpHost: raw.FTP_HOST,
    ftpPort: raw.FTP_PORT,
    ftpUser: raw.FTP_USER,
    ftpPassword: raw.FTP_PASSWORD,
    ftpSecure: raw.FTP_SECURE,
    remoteRoot: raw.FTP_ROOT,
    timeoutMs: raw.FTP_TIMEOUT_MS,
    sftpHost: raw.SFTP_HOST ?? raw.FTP_HOST,
    sftpPort: raw.SFTP_PORT,
    sftpUsername: raw.SFTP_USERNAME ?? raw.FTP_USER,
    sftpPassword: raw.SFTP_PASSWORD,
    sftpPrivateKey: loadPrivateKey(raw.SFTP_PRIVATE_KEY ?? raw.SFTP_PRIVATE_KEY_PATH),
    sftpPassphrase: raw.SFTP_PASSPHRASE,
    sshAgent: raw.SSH_AUTH_SOCK,
  };
}

let processConfig: ServiceConfig | undefined;

/** Configuration from the process environment, read once. */
export function defaultConfig(): ServiceConfig {
  processConfig ??= resolveConfig();
  return processConfig;
}

export function uploadTargetFromConfig(config: ServiceConfig): UploadTarget {
  if (config.protocol === 'sftp') {
    return {
      protocol: 'sftp',
      host: config.sftpHost,
      port: config.sftpPort,
      username: config.sftpUsername,
      password: config.sftpPassword,
      privateKey: config.sftpPrivateKey,
      passphrase: config.sftpPassphrase,
      agent: config.sftpPassword === undefined ? config.sshAgent : undefined,
      timeoutMs: config.timeoutMs,
      remoteRoot: config.remoteRoot,
    };
  }

  return {
    protocol: 'ftp',
    host: config.ftpHost,
    port: config.ftpPort,
    user: config.ftpUser,
    password: config.ftpPassword,
    secure: config.ftpSecure,
    timeoutMs: config.timeoutMs,
    remoteRoot: config.remoteRoot,
  };
}
