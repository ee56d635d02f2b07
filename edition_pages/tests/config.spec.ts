import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { describe, expect, it } from 'vitest';

import { resolveConfig, uploadTargetFromConfig } from '../src/index.js';

describe('resolveConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = resolveConfig({});

    expect(config).toMatchObject({
      pagesRoot: path.join(os.homedir(), 'Server/Pages'),
      pagesDirFormat: 'yyyy-MM-dd EEEE MMM d',
      pressPdfsDirFormat: "'PDFs' ddMMyy",
      webPdfsDirFormat: "'E-edition PDFs' ddMMyy",
      publicationCode: 'MS',
      logLevel: 'silent',
      protocol: 'ftp',
      ftpHost: 'localhost',
      ftpPort: 21,
      ftpUser: 'anonymous',
      ftpPassword: '',
      ftpSecure: false,
      timeoutMs: 10000,
      sftpHost: 'localhost',
      sftpPort: 22,
      sftpUsername: 'anonymous',
    });
    expect(config.sftpPassword).toBeUndefined();
    expect(config.remoteRoot).toBeUndefined();
  });

  it('trims values and parses numbers and flags', () => {
    const config = resolveConfig({
      PAGES_ROOT: ' /srv/pages ',
      FTP_PORT: '2121',
      FTP_SECURE: 'yes',
      FTP_TIMEOUT_MS: 'soon',
      LOG_LEVEL: 'DEBUG',
      FTP_ROOT: '  ',
    });

    expect(config.pagesRoot).toBe('/srv/pages');
    expect(config.ftpPort).toBe(2121);
    expect(config.ftpSecure).toBe(true);
    expect(config.timeoutMs).toBe(10000);
    expect(config.logLevel).toBe('debug');
    expect(config.remoteRoot).toBeUndefined();
  });

  it('ignores unknown log levels', () => {
    expect(resolveConfig({ LOG_LEVEL: 'loud' }).logLevel).toBe('silent');
  });

  it('reads a private key from a file path', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'edition-pages-key-'));
    const keyPath = path.join(dir, 'id_test');
    await fs.writeFile(keyPath, 'test-key-contents');

    try {
      expect(resolveConfig({ SFTP_PRIVATE_KEY_PATH: keyPath }).sftpPrivateKey).toBe('test-key-contents');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('takes an inline private key as-is', () => {
    expect(resolveConfig({ SFTP_PRIVATE_KEY: 'test-inline-key' }).sftpPrivateKey).toBe('test-inline-key');
  });
});

describe('uploadTargetFromConfig', () => {
  it('builds an FTP target', () => {
    const target = uploadTargetFromConfig(
      resolveConfig({ FTP_HOST: 'ftp.example.test', FTP_USER: 'press', FTP_PASSWORD: 'test-secret' }),
    );

    expect(target).toEqual({
      protocol: 'ftp',
      host: 'ftp.example.test',
      port: 21,
      user: 'press',
      password: 'test-secret',
      secure: false,
      timeoutMs: 10000,
    });
  });

  it('builds an SFTP target that falls back to the FTP host and user', () => {
    const target = uploadTargetFromConfig(
      resolveConfig({
        FTP_PROTOCOL: 'SFTP',
        FTP_HOST: 'files.example.test',
        FTP_USER: 'press',
        SFTP_PRIVATE_KEY: 'test-inline-key',
        SSH_AUTH_SOCK: '/tmp/agent.sock',
      }),
    );

    expect(target).toEqual({
      protocol: 'sftp',
      host: 'files.example.test',
      port: 22,
      username: 'press',
      password: undefined,
      privateKey: 'test-inline-key',
      passphrase: undefined,
      agent: '/tmp/agent.sock',
      timeoutMs: 10000,
    });
  });

  it('carries FTP_ROOT as the default remote directory', () => {
    expect(uploadTargetFromConfig(resolveConfig({ FTP_ROOT: ' /incoming ' }))).toMatchObject({
      protocol: 'ftp',
      remoteRoot: '/incoming',
    });
    expect(uploadTargetFromConfig(resolveConfig({ FTP_PROTOCOL: 'sftp', FTP_ROOT: '/incoming' }))).toMatchObject({
      protocol: 'sftp',
      remoteRoot: '/incoming',
    });
  });

  it('reads explicit false flags', () => {
    expect(resolveConfig({ FTP_SECURE: 'off' }).ftpSecure).toBe(false);
    expect(resolveConfig({ FTP_SECURE: 'ON' }).ftpSecure).toBe(true);
  });

  it('skips the agent when an SFTP password is set', () => {
    const target = uploadTargetFromConfig(
      resolveConfig({ FTP_PROTOCOL: 'sftp', SFTP_PASSWORD: 'test-secret', SSH_AUTH_SOCK: '/tmp/agent.sock' }),
    );

    expect(target).toMatchObject({ protocol: 'sftp', password: 'test-secret', agent: undefined });
  });
});
