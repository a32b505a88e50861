import { gzipSync } from 'fflate';
import { CompressionError } from './errors';

export const DEFAULT_COMPRESSION_THRESHOLD_BYTES = 1400;

export const CONTENT_ENCODING_GZIP = 'gzip';

export const gzipCompressor = (data: Uint8Array): Uint8Array => {
  try {
    return gzipSync(data);
  } catch (error) {
    throw new CompressionError('gzip compression failed', { cause: error });
  }
};
