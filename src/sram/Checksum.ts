// src/sram/Checksum.ts
import { readUint, writeUint } from '../codec/BitPacking';
import { CHECKSUM_SIZE } from './Layout';
import type { RecordDescriptor } from './types';

export interface ChecksumReport {
  record: RecordDescriptor;
  stored: number;
  expected: number;
  valid: boolean;
}

/**
 * Checksum de liga usado pelo jogo: soma simples dos bytes dos registros,
 * truncada em 16 bits (gravada little-endian logo depois dos dados).
 */
export function computeChecksum(recordBytes: Uint8Array): number {
  let sum = 0;
  for (const b of recordBytes) sum += b;
  return sum & 0xffff;
}

export function verifyChecksum(recordBytes: Uint8Array, stored: number): boolean {
  return computeChecksum(recordBytes) === stored;
}

export function recordBytes(image: Uint8Array, record: RecordDescriptor): Uint8Array {
  return image.subarray(record.offset, record.offset + record.size);
}

export function readStoredChecksum(image: Uint8Array, record: RecordDescriptor): number {
  return readUint(image.subarray(record.checksumOffset, record.checksumOffset + CHECKSUM_SIZE), 'little');
}

/** Recalcula e grava o checksum do registro; devolve o valor gravado. */
export function embedChecksum(image: Uint8Array, record: RecordDescriptor): number {
  const checksum = computeChecksum(recordBytes(image, record));
  image.set(writeUint(checksum, CHECKSUM_SIZE, 'little'), record.checksumOffset);
  return checksum;
}

export function checkRecord(image: Uint8Array, record: RecordDescriptor): ChecksumReport {
  const stored = readStoredChecksum(image, record);
  const expected = computeChecksum(recordBytes(image, record));
  return { record, stored, expected, valid: stored === expected };
}

export function formatChecksum(value: number): string {
  // mesma ordem de bytes do arquivo: 0x35ED → "ED35"
  return Array.from(writeUint(value, CHECKSUM_SIZE, 'little'), (b) => b.toString(16).toUpperCase().padStart(2, '0')).join('');
}
