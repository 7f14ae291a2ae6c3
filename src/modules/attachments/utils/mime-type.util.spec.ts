import { FileTypeUtil } from '../../../common/utils/file-type.util';
import { MimeTypeUtil } from './mime-type.util';

jest.mock('../../../common/utils/file-type.util', () => ({
  FileTypeUtil: {
    validateBuffer: jest.fn(),
  },
}));

describe('MimeTypeUtil', () => {
  const validateBuffer = jest.mocked(FileTypeUtil.validateBuffer);
  const readHead = jest.fn().mockResolvedValue(Buffer.from('head'));

  beforeEach(() => {
    validateBuffer.mockReset();
    readHead.mockClear();
  });

  describe('fromFilename', () => {
    it('should map known extensions', () => {
      expect(MimeTypeUtil.fromFilename('photo.png')).toBe('image/png');
      expect(MimeTypeUtil.fromFilename('scan.JPG')).toBe('image/jpeg');
      expect(MimeTypeUtil.fromFilename('contract.pdf')).toBe('application/pdf');
    });

    it('should return undefined for unknown or missing names', () => {
      expect(MimeTypeUtil.fromFilename('passwd')).toBeUndefined();
      expect(MimeTypeUtil.fromFilename(null)).toBeUndefined();
    });
  });

  describe('detect', () => {
    it('should keep a specific declared type', async () => {
      await expect(MimeTypeUtil.detect(' text/plain ', 'photo.png', readHead)).resolves.toBe('text/plain');
      expect(readHead).not.toHaveBeenCalled();
    });

    it('should use the extension for a declared octet-stream', async () => {
      await expect(MimeTypeUtil.detect('application/octet-stream', 'photo.png', readHead)).resolves.toBe(
        'image/png',
      );
      expect(validateBuffer).not.toHaveBeenCalled();
    });

    it('should fall back to the signature when the extension is unknown', async () => {
      validateBuffer.mockResolvedValue({ mime: 'image/gif', ext: 'gif' });

      await expect(MimeTypeUtil.detect('application/octet-stream', 'upload', readHead)).resolves.toBe('image/gif');
      expect(validateBuffer).toHaveBeenCalledWith(Buffer.from('head'));
    });

    it('should keep the declared octet-stream when nothing matches', async () => {
      validateBuffer.mockResolvedValue(undefined);

      await expect(MimeTypeUtil.detect('application/octet-stream', 'upload', readHead)).resolves.toBe(
        'application/octet-stream',
      );
    });

    it('should return null when nothing is declared or detected', async () => {
      validateBuffer.mockResolvedValue(undefined);

      await expect(MimeTypeUtil.detect(null, null, readHead)).resolves.toBeNull();
    });
  });
});
