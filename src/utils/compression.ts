import { PassThrough, type Transform } from 'node:stream';
import zlib from 'node:zlib';
import type { CompressionAlgorithm } from '../types/backup.js';
import { BackupError } from '../types/errors.js';

export const COMPRESSION_ALGORITHMS: readonly CompressionAlgorithm[] = ['none', 'gzip', 'brotli'];

const ARCHIVE_EXTENSIONS: Record<CompressionAlgorithm, string> = {
  none: '.tar',
  gzip: '.tar.gz',
  brotli: '.tar.br',
};

export interface CompressionOptions {
  /** zlib level 0-9 for gzip. */
  gzipLevel?: number;
  /** Quality 0-11 for brotli. */
  brotliQuality?: number;
}

const DEFAULT_GZIP_LEVEL = 6;
const DEFAULT_BROTLI_QUALITY = 9;

export function isCompressionAlgorithm(value: unknown): value is CompressionAlgorithm {
  return typeof value === 'string' && (COMPRESSION_ALGORITHMS as readonly string[]).includes(value);
}

export function archiveExtension(algorithm: CompressionAlgorithm): string {
  return ARCHIVE_EXTENSIONS[algorithm];
}

export function createCompressor(algorithm: CompressionAlgorithm, options: CompressionOptions = {}): Transform {
  switch (algorithm) {
    case 'none':
      return new PassThrough();
    case 'gzip':
      return zlib.createGzip({ level: options.gzipLevel ?? DEFAULT_GZIP_LEVEL });
    case 'brotli':
      return zlib.createBrotliCompress({
        params: {
          [zlib.constants.BROTLI_PARAM_QUALITY]: options.brotliQuality ?? DEFAULT_BROTLI_QUALITY,
        },
      });
    default:
      throw new BackupError('InvalidArgument', `Unsupported compression algorithm '${String(algorithm)}'.`);
  }
}

export function createDecompressor(algorithm: CompressionAlgorithm): Transform {
  switch (algorithm) {
    case 'none':
      return new PassThrough();
    case 'gzip':
      return zlib.createGunzip();
    case 'brotli':
      return zlib.createBrotliDecompress();
    default:
      throw new BackupError('InvalidArgument', `Unsupported compression algorithm '${String(algorithm)}'.`);
  }
}
