import { readFileSync } from 'fs';
import { open } from 'fs/promises';

/** Number of leading bytes considered when sniffing. */
export const SNIFF_LENGTH = 512;

type Signature =
  | { kind: 'html'; pattern: Buffer; contentType: string }
  | { kind: 'masked'; mask: Buffer; pattern: Buffer; skipWhitespace: boolean; contentType: string }
  | { kind: 'exact'; pattern: Buffer; contentType: string }
  | { kind: 'mp4'; contentType: string }
  | { kind: 'text'; contentType: string };

interface SignatureTable {
  fallback: string;
  signatures: Signature[];
}

let table: SignatureTable | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hexField(entry: Record<string, unknown>, field: string): Buffer {
  const value = entry[field];
  if (typeof value !== 'string' || !/^(?:[0-9a-f]{2})*$/.test(value)) {
    throw new Error(`sniff signature: ${field} must be a hex string`);
  }
  return Buffer.from(value, 'hex');
}

function parseSignature(entry: unknown): Signature {
  if (!isRecord(entry) || typeof entry.contentType !== 'string') {
    throw new Error('sniff signature: contentType missing');
  }
  const contentType = entry.contentType;
  switch (entry.kind) {
    case 'html':
      return { kind: 'html', pattern: hexField(entry, 'pattern'), contentType };
    case 'masked': {
      const mask = hexField(entry, 'mask');
      const pattern = hexField(entry, 'pattern');
      if (mask.length !== pattern.length) {
        throw new Error(`sniff signature: mask and pattern differ in length for ${contentType}`);
      }
      return { kind: 'masked', mask, pattern, skipWhitespace: entry.skipWhitespace === true, contentType };
    }
    case 'exact':
      return { kind: 'exact', pattern: hexField(entry, 'pattern'), contentType };
    case 'mp4':
      return { kind: 'mp4', contentType };
    case 'text':
      return { kind: 'text', contentType };
    default:
      throw new Error(`sniff signature: unknown kind ${String(entry.kind)}`);
  }
}

function loadTable(): SignatureTable {
  if (!table) {
    const raw: unknown = JSON.parse(readFileSync(new URL('./sniff-signatures.json', import.meta.url), 'utf8'));
    if (!isRecord(raw) || typeof raw.fallback !== 'string' || !Array.isArray(raw.signatures)) {
      throw new Error('sniff signatures: malformed table');
    }
    table = { fallback: raw.fallback, signatures: raw.signatures.map(parseSignature) };
  }
  return table;
}

// Whitespace as defined by the MIME sniffing standard: TAB, LF, FF, CR, SPACE.
function isWhitespace(byte: number): boolean {
  return byte === 0x09 || byte === 0x0a || byte === 0x0c || byte === 0x0d || byte === 0x20;
}

function skipWhitespace(data: Buffer): Buffer {
  let start = 0;
  while (start < data.length && isWhitespace(data[start] ?? 0)) start++;
  return data.subarray(start);
}

function isBinaryByte(byte: number): boolean {
  return byte <= 0x08 || byte === 0x0b || (byte >= 0x0e && byte <= 0x1a) || (byte >= 0x1c && byte <= 0x1f);
}

function matchHtml(data: Buffer, pattern: Buffer): boolean {
  const body = skipWhitespace(data);
  if (body.length < pattern.length + 1) return false;
  for (let i = 0; i < pattern.length; i++) {
    const expected = pattern[i] ?? 0;
    let actual = body[i] ?? 0;
    // Tag names compare case-insensitively.
    if (expected >= 0x41 && expected <= 0x5a) actual &= 0xdf;
    if (expected !== actual) return false;
  }
  // The tag must be terminated by a space or '>'.
  const terminator = body[pattern.length];
  return terminator === 0x20 || terminator === 0x3e;
}

function matchMasked(data: Buffer, signature: { mask: Buffer; pattern: Buffer; skipWhitespace: boolean }): boolean {
  const body = signature.skipWhitespace ? skipWhitespace(data) : data;
  if (body.length < signature.pattern.length) return false;
  for (let i = 0; i < signature.pattern.length; i++) {
    if (((body[i] ?? 0) & (signature.mask[i] ?? 0)) !== signature.pattern[i]) return false;
  }
  return true;
}

function matchMp4(data: Buffer): boolean {
  if (data.length < 12) return false;
  const boxSize = data.readUInt32BE(0);
  if (data.length < boxSize || boxSize % 4 !== 0) return false;
  if (data.toString('latin1', 4, 8) !== 'ftyp') return false;
  for (let offset = 8; offset < boxSize; offset += 4) {
    // Bytes 12..15 hold the minor version, not a brand.
    if (offset === 12) continue;
    if (data.toString('latin1', offset, offset + 3) === 'mp4') return true;
  }
  return false;
}

function matchText(data: Buffer): boolean {
  for (const byte of skipWhitespace(data)) {
    if (isBinaryByte(byte)) return false;
  }
  return true;
}

function matches(signature: Signature, data: Buffer): boolean {
  switch (signature.kind) {
    case 'html':
      return matchHtml(data, signature.pattern);
    case 'masked':
      return matchMasked(data, signature);
    case 'exact':
      return data.subarray(0, signature.pattern.length).equals(signature.pattern);
    case 'mp4':
      return matchMp4(data);
    case 'text':
      return matchText(data);
  }
}

/**
 * Determine a content type from the leading bytes of a file.
 * Always returns a type; unrecognised binary content maps to `application/octet-stream`.
 */
export function sniffContentType(input: Uint8Array): string {
  const data = Buffer.from(input.buffer, input.byteOffset, Math.min(input.byteLength, SNIFF_LENGTH));
  const { signatures, fallback } = loadTable();
  const match = signatures.find(signature => matches(signature, data));
  return match ? match.contentType : fallback;
}

/**
 * Sniff the file at `absolutePath`. Any open or read failure yields an empty string.
 */
export async function sniffFile(absolutePath: string): Promise<string> {
  try {
    const handle = await open(absolutePath, 'r');
    try {
      const buffer = Buffer.alloc(SNIFF_LENGTH);
      const { bytesRead } = await handle.read(buffer, 0, SNIFF_LENGTH, 0);
      return sniffContentType(buffer.subarray(0, bytesRead));
    } finally {
      await handle.close();
    }
  } catch {
    return '';
  }
}
