import { describe, it, expect } from 'vitest'
import { extractBits, insertBits, maxUint, readUint, writeUint } from '../BitPacking'

describe('BitPacking', () => {
  it('lê inteiros little/big-endian', () => {
    const bytes = Uint8Array.of(0x12, 0x34)
    expect(readUint(bytes, 'little')).toBe(0x3412)
    expect(readUint(bytes, 'big')).toBe(0x1234)
    expect(readUint(Uint8Array.of(0x89, 0x59, 0x99), 'big')).toBe(0x895999)
  })

  it('escreve inteiros na ordem pedida', () => {
    expect([...writeUint(0x35ed, 2, 'little')]).toEqual([0xed, 0x35])
    expect([...writeUint(0x35ed, 2, 'big')]).toEqual([0x35, 0xed])
    expect([...writeUint(0xb12345, 3, 'big')]).toEqual([0xb1, 0x23, 0x45])
  })

  it('rejeita larguras acima de 4 bytes', () => {
    expect(() => readUint(new Uint8Array(5), 'big')).toThrow(RangeError)
  })

  it('maxUint por largura', () => {
    expect(maxUint(1)).toBe(0xff)
    expect(maxUint(2)).toBe(0xffff)
  })

  it('extrai fatias de bits a partir do LSB', () => {
    const word = 0xb12345
    expect(extractBits(word, { shift: 0, length: 8 })).toBe(0x45)
    expect(extractBits(word, { shift: 16, length: 4 })).toBe(0x1)
    expect(extractBits(word, { shift: 20, length: 2 })).toBe(3)
    expect(extractBits(word, { shift: 22, length: 1 })).toBe(0)
    expect(extractBits(word, { shift: 23, length: 1 })).toBe(1)
  })

  it('insere bits preservando os vizinhos', () => {
    expect(insertBits(0x095999, { shift: 20, length: 2 }, 3)).toBe(0x395999)
    expect(insertBits(0xb12345, { shift: 23, length: 1 }, 0)).toBe(0x312345)
    // valor maior que a fatia é truncado pela máscara
    expect(insertBits(0x000000, { shift: 22, length: 1 }, 3)).toBe(0x400000)
  })
})
