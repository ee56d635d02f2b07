export { Page, parsePageName, type ExternalNameOptions } from './page.js';
export {
  directoryInddFiles,
  directoryPdfFiles,
  editionDir,
  editionInddFiles,
  editionPressPdfs,
  editionPressPdfsDir,
  editionWebPdfs,
  editionWebPdfsDir,
  pathsToPages,
  type EditionOptions,
} from './edition.js';
export { sendPages, sendPagesFtp, sendPagesSftp, type FtpUploadOptions, type SftpUploadOptions } from './uploading.js';
export { createUploadSession } from './clientFactory.js';
export { defaultConfig, resolveConfig, uploadTargetFromConfig, type EditionLayout, type LogLevel, type ServiceConfig } from './config.js';
export { EditionPagesError, NoEditionError, PageNameError, UploadError, type UploadErrorCode } from './errors.js';
export { logger } from './logger.js';
export type * from './types.js';
