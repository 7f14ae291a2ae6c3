export type StorageKind = 'file_system' | 's3';

export interface SizeRange {
  min: number;
  max: number;
}

/**
 * Per-model attachment options.
 *
 * @example
 * ```typescript
 * AttachmentsModule.register({ maxSize: 1024 });
 * AttachmentsModule.register({ size: { min: 1024 * 1024, max: 2 * 1024 * 1024 } });
 * AttachmentsModule.register({ contentType: ['application/pdf', 'text/plain'] });
 * AttachmentsModule.register({ contentType: 'image' });
 * ```
 */
export interface AttachmentOptions {
  /** Allowed content types. All types are allowed when omitted; `image` expands to the known image types. */
  contentType?: string | string[];
  /** Minimum size in bytes. Defaults to 1. */
  minSize?: number;
  /** Maximum size in bytes. Defaults to 1 MiB. */
  maxSize?: number;
  /** Inclusive size range. Overrides `minSize` and `maxSize`. */
  size?: SizeRange;
  /** Storage key namespace. */
  pathPrefix?: string;
  storage?: StorageKind;
}

export interface ResolvedAttachmentOptions {
  readonly contentTypes: readonly string[] | null;
  readonly size: Readonly<SizeRange>;
  readonly pathPrefix: string;
  readonly storage: StorageKind;
}
