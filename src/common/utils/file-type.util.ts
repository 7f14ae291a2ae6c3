export class FileTypeUtil {
  static async validateBuffer(buffer: Buffer): Promise<{ mime: string; ext: string } | undefined> {
    const FileType = await import('file-type');
    const typeInfo = await FileType.fromBuffer(buffer);
    if (!typeInfo) return undefined;

    return { mime: typeInfo.mime, ext: typeInfo.ext };
  }
}
