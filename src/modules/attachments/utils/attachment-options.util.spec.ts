import { AttachmentError } from '../../../common/exceptions';
import { IMAGE_CONTENT_TYPES } from '../constants/attachment.constants';
import { isImageContentType, resolveAttachmentOptions } from './attachment-options.util';

describe('resolveAttachmentOptions', () => {
  it('should apply the defaults', () => {
    expect(resolveAttachmentOptions()).toEqual({
      contentTypes: null,
      size: { min: 1, max: 1048576 },
      pathPrefix: 'attachments',
      storage: 'file_system',
    });
  });

  it('should let an explicit size range override min and max', () => {
    const options = resolveAttachmentOptions({ minSize: 10, maxSize: 20, size: { min: 1, max: 5 } });
    expect(options.size).toEqual({ min: 1, max: 5 });
  });

  it('should keep the default maximum when only a minimum is given', () => {
    expect(resolveAttachmentOptions({ minSize: 100 }).size).toEqual({ min: 100, max: 1048576 });
  });

  it('should keep the default minimum when only a maximum is given', () => {
    expect(resolveAttachmentOptions({ maxSize: 1024 }).size).toEqual({ min: 1, max: 1024 });
  });

  it('should reject an inverted range', () => {
    expect(() => resolveAttachmentOptions({ size: { min: 10, max: 1 } })).toThrow(AttachmentError);
  });

  it('should wrap a single content type in a list', () => {
    expect(resolveAttachmentOptions({ contentType: 'application/pdf' }).contentTypes).toEqual(['application/pdf']);
  });

  it('should expand the image shorthand', () => {
    const options = resolveAttachmentOptions({ contentType: ['application/pdf', 'image'] });
    expect(options.contentTypes).toEqual(['application/pdf', ...IMAGE_CONTENT_TYPES]);
  });

  it('should strip leading and trailing slashes from the path prefix', () => {
    expect(resolveAttachmentOptions({ pathPrefix: '/public/documents' }).pathPrefix).toBe('public/documents');
    expect(resolveAttachmentOptions({ pathPrefix: 'uploads/' }).pathPrefix).toBe('uploads');
  });

  it('should take module defaults below explicit options', () => {
    const options = resolveAttachmentOptions({ storage: 'file_system' }, { pathPrefix: 'uploads', storage: 's3' });
    expect(options.pathPrefix).toBe('uploads');
    expect(options.storage).toBe('file_system');
  });

  it('should reject an unknown storage backend', () => {
    expect(() => resolveAttachmentOptions({}, { storage: 'ftp' })).toThrow('Unknown attachment storage: ftp');
  });

  it('should return a frozen constraint set', () => {
    const options = resolveAttachmentOptions({ contentType: 'image' });
    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.size)).toBe(true);
    expect(Object.isFrozen(options.contentTypes)).toBe(true);
  });
});

describe('isImageContentType', () => {
  it('should recognise known image types', () => {
    expect(isImageContentType('image/png')).toBe(true);
    expect(isImageContentType('image/x-citrix-pjpeg')).toBe(true);
  });

  it('should reject other types and null', () => {
    expect(isImageContentType('application/pdf')).toBe(false);
    expect(isImageContentType(null)).toBe(false);
  });
});
