import { lookup } from 'mime-types';
import { FileTypeUtil } from '../../../common/utils/file-type.util';
import { OCTET_STREAM } from '../constants/attachment.constants';

export class MimeTypeUtil {
  /**
   * Canonical MIME type for the filename's extension.
   */
  static fromFilename(filename: string | null): string | undefined {
    if (!filename) return undefined;
    const mime = lookup(filename);
    return mime === false ? undefined : mime;
  }

  /**
   * Resolves the content type of an upload. A declared generic octet-stream
   * (or a missing declaration) is replaced by the extension's type, then by the
   * magic-byte signature of the data.
   */
  static async detect(
    declared: string | null | undefined,
    filename: string | null,
    readHead: () => Promise<Buffer>,
  ): Promise<string | null> {
    const trimmed = declared?.trim() || null;
    if (trimmed && trimmed !== OCTET_STREAM) {
      return trimmed;
    }

    const byExtension = MimeTypeUtil.fromFilename(filename);
    if (byExtension) {
      return byExtension;
    }

    const bySignature = await FileTypeUtil.validateBuffer(await readHead());
    return bySignature?.mime ?? trimmed;
  }
}
