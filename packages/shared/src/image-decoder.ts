import { createHash } from 'node:crypto';
import { type DecodedImage, type ImageDecoder } from '@gatehouse/domain';

export const DEFAULT_MAX_IMAGE_BYTES = 5 * 1024 * 1024;
export const MAX_IMAGE_DIMENSION = 2048;

const DATA_URL_PREFIX = /^data:image\/[a-z0-9.+-]+;base64,/i;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

interface Dimensions {
  width: number;
  height: number;
}

interface ImageFormat {
  mimeType: string;
  matches(bytes: Buffer): boolean;
  dimensions(bytes: Buffer): Dimensions | null;
}

function startsWith(bytes: Buffer, signature: number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

const FORMATS: readonly ImageFormat[] = [
  {
    mimeType: 'image/png',
    matches: (b) => startsWith(b, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    dimensions: (b) => (b.length >= 24 ? { width: b.readUInt32BE(16), height: b.readUInt32BE(20) } : null),
  },
  {
    mimeType: 'image/jpeg',
    matches: (b) => startsWith(b, [0xff, 0xd8, 0xff]),
    dimensions: jpegDimensions,
  },
  {
    mimeType: 'image/gif',
    matches: (b) => b.length >= 6 && ['GIF87a', 'GIF89a'].includes(b.toString('latin1', 0, 6)),
    dimensions: (b) => (b.length >= 10 ? { width: b.readUInt16LE(6), height: b.readUInt16LE(8) } : null),
  },
  {
    mimeType: 'image/bmp',
    matches: (b) => startsWith(b, [0x42, 0x4d]),
    dimensions: (b) =>
      b.length >= 26 ? { width: Math.abs(b.readInt32LE(18)), height: Math.abs(b.readInt32LE(22)) } : null,
  },
  {
    mimeType: 'image/webp',
    matches: (b) => b.length >= 12 && b.toString('latin1', 0, 4) === 'RIFF' && b.toString('latin1', 8, 12) === 'WEBP',
    dimensions: webpDimensions,
  },
];

/** Scans JPEG segments for a start-of-frame marker. */
function jpegDimensions(b: Buffer): Dimensions | null {
  let offset = 2;
  while (offset + 9 < b.length) {
    if (b[offset] !== 0xff) return null;
    const marker = b[offset + 1];
    const isStartOfFrame = marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
    if (isStartOfFrame) {
      return { height: b.readUInt16BE(offset + 5), width: b.readUInt16BE(offset + 7) };
    }
    offset += 2 + b.readUInt16BE(offset + 2);
  }
  return null;
}

function webpDimensions(b: Buffer): Dimensions | null {
  if (b.length < 30) return null;
  const chunk = b.toString('latin1', 12, 16);
  if (chunk === 'VP8X') {
    return { width: 1 + b.readUIntLE(24, 3), height: 1 + b.readUIntLE(27, 3) };
  }
  if (chunk === 'VP8 ') {
    return { width: b.readUInt16LE(26) & 0x3fff, height: b.readUInt16LE(28) & 0x3fff };
  }
  if (chunk === 'VP8L') {
    const bits = b.readUInt32LE(21);
    return { width: (bits & 0x3fff) + 1, height: ((bits >> 14) & 0x3fff) + 1 };
  }
  return null;
}

/**
 * Validates a base64 face image and reduces it to a SHA-256 content hash.
 * Dimensions are checked only when the header exposes them.
 */
export class Base64ImageDecoder implements ImageDecoder {
  constructor(private readonly maxBytes: number = DEFAULT_MAX_IMAGE_BYTES) {}

  decode(encoded: string): DecodedImage {
    const body = encoded.trim().replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
    if (body === '') {
      return { ok: false, error: 'image is empty' };
    }
    if (body.length % 4 !== 0 || !BASE64_BODY.test(body)) {
      return { ok: false, error: 'image is not valid base64' };
    }

    const bytes = Buffer.from(body, 'base64');
    if (bytes.length > this.maxBytes) {
      return { ok: false, error: `image exceeds ${this.maxBytes} bytes` };
    }

    const format = FORMATS.find((f) => f.matches(bytes));
    if (!format) {
      return { ok: false, error: 'unsupported image format' };
    }

    const size = format.dimensions(bytes);
    if (size && (size.width > MAX_IMAGE_DIMENSION || size.height > MAX_IMAGE_DIMENSION)) {
      return { ok: false, error: `image dimensions exceed ${MAX_IMAGE_DIMENSION}x${MAX_IMAGE_DIMENSION}` };
    }

    return {
      ok: true,
      mimeType: format.mimeType,
      byteLength: bytes.length,
      contentHash: createHash('sha256').update(bytes).digest('hex'),
    };
  }
}
