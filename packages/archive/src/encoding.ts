/**
 * Text encoding for archive entries
 *
 * project.xml is usually UTF-16 with a byte order mark; logs are UTF-8.
 * A decoded document remembers how it was read so it can be written back
 * the same way.
 */

import { SchemashiftError } from '@schemashift/core';

export type DocumentEncoding = 'utf-16le' | 'utf-16be' | 'utf-8';

export interface DecodedDocument {
  text: string;
  encoding: DocumentEncoding;
  /** Whether the source carried a byte order mark */
  bom: boolean;
}

/** Fallback order when the bytes carry no BOM */
const DECODE_ORDER: readonly DocumentEncoding[] = ['utf-16le', 'utf-16be', 'utf-8'];

const BOMS: ReadonlyArray<{ encoding: DocumentEncoding; bytes: readonly number[] }> = [
  { encoding: 'utf-8', bytes: [0xef, 0xbb, 0xbf] },
  { encoding: 'utf-16le', bytes: [0xff, 0xfe] },
  { encoding: 'utf-16be', bytes: [0xfe, 0xff] },
];

function tryDecode(bytes: Uint8Array, encoding: DocumentEncoding): string | undefined {
  try {
    return new TextDecoder(encoding, { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function detectBom(bytes: Uint8Array): DocumentEncoding | undefined {
  return BOMS.find((bom) => bom.bytes.every((b, i) => bytes[i] === b))?.encoding;
}

/**
 * Guess from the leading `<` of an XML document
 */
function sniffXml(bytes: Uint8Array): DocumentEncoding | undefined {
  if (bytes[0] === 0x3c && bytes[1] === 0x00) return 'utf-16le';
  if (bytes[0] === 0x00 && bytes[1] === 0x3c) return 'utf-16be';
  if (bytes[0] === 0x3c) return 'utf-8';
  return undefined;
}

function bomLength(encoding: DocumentEncoding): number {
  return encoding === 'utf-8' ? 3 : 2;
}

/**
 * Decode a metadata document. Throws DECODE_FAILED when no supported
 * encoding accepts the bytes.
 */
export function decodeDocument(bytes: Uint8Array): DecodedDocument {
  const bomEncoding = detectBom(bytes);
  if (bomEncoding) {
    const text = tryDecode(bytes.subarray(bomLength(bomEncoding)), bomEncoding);
    if (text !== undefined) {
      return { text, encoding: bomEncoding, bom: true };
    }
  } else {
    const sniffed = sniffXml(bytes);
    const order = sniffed ? [sniffed, ...DECODE_ORDER.filter((e) => e !== sniffed)] : DECODE_ORDER;
    for (const encoding of order) {
      const text = tryDecode(bytes, encoding);
      if (text !== undefined) {
        return { text, encoding, bom: false };
      }
    }
  }

  throw new SchemashiftError({
    code: 'DECODE_FAILED',
    message: `Document is not valid ${bomEncoding ?? DECODE_ORDER.join(', ')}`,
    suggestion: 'Re-save the project in Enterprise Guide and try again.',
  });
}

/**
 * Encode text with the encoding and BOM of the original document
 */
export function encodeDocument(text: string, source: Pick<DecodedDocument, 'encoding' | 'bom'>): Uint8Array {
  const bom = source.bom
    ? Buffer.from(BOMS.find((b) => b.encoding === source.encoding)?.bytes ?? [])
    : Buffer.alloc(0);

  let body: Buffer;
  switch (source.encoding) {
    case 'utf-8':
      body = Buffer.from(text, 'utf-8');
      break;
    case 'utf-16le':
      body = Buffer.from(text, 'utf16le');
      break;
    case 'utf-16be':
      body = Buffer.from(text, 'utf16le').swap16();
      break;
  }

  return Buffer.concat([bom, body]);
}

/**
 * Decode a log as UTF-8; invalid bytes become U+FFFD instead of failing
 */
export function decodeLog(bytes: Uint8Array): string {
  return new TextDecoder('utf-8').decode(bytes);
}

export function encodeLog(text: string): Uint8Array {
  return Buffer.from(text, 'utf-8');
}
