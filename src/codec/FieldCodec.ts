// src/codec/FieldCodec.ts
//
// Decodifica/codifica campos do SaveImage a partir dos descritores do Layout.
// Funções puras: encodeField nunca mexe no buffer, writeField só escreve
// depois que a fatia inteira foi montada e validada.

import { DecodeError, EncodeError } from '../errors/SramError';
import type { FieldDescriptor, FieldValue } from '../sram/types';
import { fromBcd, isValidBcd, maxBcd, toBcd } from './Bcd';
import { extractBits, insertBits, maxUint, readUint, writeUint } from './BitPacking';

export interface DecodeOptions {
  /** Rejeita bytes inválidos em vez de devolver o valor "melhor esforço". */
  strict?: boolean;
}

/** Fatia (view) dos bytes do campo dentro da imagem. */
export function readSlice(bytes: Uint8Array, field: FieldDescriptor): Uint8Array {
  const end = field.offset + field.width;
  if (end > bytes.length) {
    throw new DecodeError(
      `Campo "${field.id}" (0x${hex(field.offset, 4)}+${field.width}) fora da imagem de ${bytes.length} bytes`
    );
  }
  return bytes.subarray(field.offset, end);
}

export function decodeField(bytes: Uint8Array, field: FieldDescriptor, options: DecodeOptions = {}): FieldValue {
  const strict = options.strict ?? false;
  const slice = readSlice(bytes, field);
  const enc = field.encoding;

  switch (enc.kind) {
    case 'ascii': {
      const text = String.fromCharCode(...slice);
      if (strict && text !== enc.expected) {
        throw new DecodeError(`Assinatura "${field.id}" inválida: ${JSON.stringify(text)}, esperado "${enc.expected}"`);
      }
      return text;
    }

    case 'uint':
      return readUint(slice, enc.endian);

    case 'bcd': {
      const bits = field.bits?.length ?? field.width * 8;
      const raw = rawBits(slice, field);
      if (strict && !isValidBcd(raw, bits)) {
        throw new DecodeError(`Campo "${field.id}": BCD inválido 0x${hex(raw, Math.ceil(bits / 4))}`);
      }
      const value = fromBcd(raw, bits);
      if (strict && value > enc.max) {
        throw new DecodeError(`Campo "${field.id}": ${value} acima do máximo ${enc.max}`);
      }
      return value;
    }

    case 'enum': {
      const raw = rawBits(slice, field);
      const value = enc.values[raw];
      if (value === undefined) {
        throw new DecodeError(`Campo "${field.id}": valor ${raw} sem nome (${enc.values.join(', ')})`);
      }
      return value;
    }

    case 'flag':
      return rawBits(slice, field) !== 0;

    case 'mirroredFlags': {
      // nibble baixo = flags, nibble alto = cópia; bits acima de `count` sempre 0
      const byte = slice[0];
      const low = byte & 0x0f;
      const high = byte >>> 4;
      const valid = low === high && low >> enc.count === 0;
      if (strict && !valid) {
        throw new DecodeError(`Campo "${field.id}": espelho inválido 0x${hex(byte, 2)}`);
      }
      // byte inválido conta como nenhuma liga liberada (como o jogo trata)
      const flags: boolean[] = [];
      for (let i = 0; i < enc.count; i++) {
        flags.push(valid && ((low >> i) & 1) !== 0);
      }
      return flags;
    }
  }
}

/**
 * Monta a nova fatia de bytes do campo com `value`. Bits vizinhos (outros
 * campos do mesmo registro de 3 bytes) são preservados a partir de `bytes`.
 */
export function encodeField(bytes: Uint8Array, field: FieldDescriptor, value: FieldValue): Uint8Array {
  const enc = field.encoding;

  switch (enc.kind) {
    case 'ascii': {
      if (typeof value !== 'string') throw typeError(field, 'texto', value);
      if (value.length !== field.width || !/^[\x20-\x7e]*$/.test(value)) {
        throw new EncodeError(`Campo "${field.id}": esperado texto ASCII de ${field.width} caracteres, recebido ${JSON.stringify(value)}`);
      }
      return Uint8Array.from(value, (c) => c.charCodeAt(0));
    }

    case 'uint': {
      const n = requireInteger(field, value, 0, maxUint(field.width));
      return writeUint(n, field.width, enc.endian);
    }

    case 'bcd': {
      const bits = field.bits?.length ?? field.width * 8;
      const n = requireInteger(field, value, 0, Math.min(enc.max, maxBcd(bits)));
      return mergeBits(bytes, field, toBcd(n, bits));
    }

    case 'enum': {
      if (typeof value !== 'string') throw typeError(field, 'nome', value);
      const idx = enc.values.indexOf(value);
      if (idx < 0) {
        throw new EncodeError(`Campo "${field.id}": "${value}" inválido (opções: ${enc.values.join(', ')})`);
      }
      return mergeBits(bytes, field, idx);
    }

    case 'flag': {
      if (typeof value !== 'boolean') throw typeError(field, 'booleano', value);
      return mergeBits(bytes, field, value ? 1 : 0);
    }

    case 'mirroredFlags': {
      if (!isFlagArray(value) || value.length !== enc.count) {
        throw new EncodeError(`Campo "${field.id}": esperado lista de ${enc.count} booleanos`);
      }
      let nibble = 0;
      value.forEach((on, i) => {
        if (on) nibble |= 1 << i;
      });
      return Uint8Array.of((nibble << 4) | nibble);
    }
  }
}

/** Codifica e grava no buffer. Em caso de erro o buffer fica intacto. */
export function writeField(bytes: Uint8Array, field: FieldDescriptor, value: FieldValue): void {
  readSlice(bytes, field);
  const slice = encodeField(bytes, field, value);
  bytes.set(slice, field.offset);
}

// ===================== Helpers =====================

function rawBits(slice: Uint8Array, field: FieldDescriptor): number {
  const word = readUint(slice, 'big');
  return field.bits ? extractBits(word, field.bits) : word;
}

function mergeBits(bytes: Uint8Array, field: FieldDescriptor, raw: number): Uint8Array {
  if (!field.bits) {
    return writeUint(raw, field.width, 'big');
  }
  const word = readUint(readSlice(bytes, field), 'big');
  return writeUint(insertBits(word, field.bits, raw), field.width, 'big');
}

function requireInteger(field: FieldDescriptor, value: FieldValue, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw typeError(field, 'inteiro', value);
  }
  if (value < min || value > max) {
    throw new EncodeError(`Campo "${field.id}": ${value} fora da faixa ${min}–${max}`);
  }
  return value;
}

function isFlagArray(value: unknown): value is readonly boolean[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'boolean');
}

function typeError(field: FieldDescriptor, expected: string, value: FieldValue): EncodeError {
  return new EncodeError(`Campo "${field.id}": esperado ${expected}, recebido ${JSON.stringify(value)}`);
}

function hex(n: number, width: number): string {
  return n.toString(16).toUpperCase().padStart(width, '0');
}
