// src/codec/BitPacking.ts
import type { BitSlice, Endian } from '../sram/types';

/**
 * Lê `bytes` como inteiro sem sinal. Larguras até 4 bytes (mais que isso
 * estouraria os operadores de bit de 32 bits).
 */
export function readUint(bytes: Uint8Array, endian: Endian): number {
  if (bytes.length > 4) {
    throw new RangeError(`Largura não suportada: ${bytes.length} bytes`);
  }
  let value = 0;
  for (let i = 0; i < bytes.length; i++) {
    const b = endian === 'big' ? bytes[i] : bytes[bytes.length - 1 - i];
    value = value * 0x100 + b;
  }
  return value;
}

/** Inverso de readUint: escreve `value` em `width` bytes. */
export function writeUint(value: number, width: number, endian: Endian): Uint8Array {
  const out = new Uint8Array(width);
  let v = value;
  for (let i = 0; i < width; i++) {
    const idx = endian === 'little' ? i : width - 1 - i;
    out[idx] = v & 0xff;
    v = Math.floor(v / 0x100);
  }
  return out;
}

export function maxUint(width: number): number {
  return 2 ** (width * 8) - 1;
}

/** Extrai `length` bits a partir de `shift` (LSB = bit 0). */
export function extractBits(word: number, slice: BitSlice): number {
  const mask = (1 << slice.length) - 1;
  return (word >>> slice.shift) & mask;
}

/** Substitui os bits da fatia em `word`, preservando os demais. */
export function insertBits(word: number, slice: BitSlice, value: number): number {
  const mask = ((1 << slice.length) - 1) << slice.shift;
  return ((word & ~mask) | ((value << slice.shift) & mask)) >>> 0;
}
