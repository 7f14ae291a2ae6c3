import { registerAs } from '@nestjs/config';

export default registerAs('attachments', () => ({
  tempfilePath: process.env.ATTACHMENT_TEMPFILE_PATH || 'tmp/attachments',
  storageRoot: process.env.ATTACHMENT_STORAGE_ROOT || 'storage',
  pathPrefix: process.env.ATTACHMENT_PATH_PREFIX || 'attachments',
  storage: process.env.ATTACHMENT_STORAGE || 'file_system',
}));
