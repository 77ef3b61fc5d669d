// src/codec/Bcd.ts
//
// BCD: cada nibble guarda um dígito decimal (0x59 → 59).
// O jogo grava tempos assim; nibbles A–F são lixo.

/** true se todos os nibbles dos `bits` baixos de `raw` são dígitos 0–9. */
export function isValidBcd(raw: number, bits: number): boolean {
  for (let shift = 0; shift < bits; shift += 4) {
    if (((raw >>> shift) & 0x0f) > 9) return false;
  }
  return true;
}

/**
 * Converte BCD → decimal. Nibbles inválidos entram com o próprio valor
 * (0x1A → 20), quem precisa de validação chama isValidBcd antes.
 */
export function fromBcd(raw: number, bits: number): number {
  let value = 0;
  let scale = 1;
  for (let shift = 0; shift < bits; shift += 4) {
    value += ((raw >>> shift) & 0x0f) * scale;
    scale *= 10;
  }
  return value;
}

/** Converte decimal → BCD com `bits` de largura (múltiplo de 4). */
export function toBcd(value: number, bits: number): number {
  let raw = 0;
  let v = value;
  for (let shift = 0; shift < bits; shift += 4) {
    raw |= (v % 10) << shift;
    v = Math.floor(v / 10);
  }
  return raw >>> 0;
}

/** Maior valor decimal representável em `bits` de BCD (8 bits → 99). */
export function maxBcd(bits: number): number {
  return 10 ** Math.ceil(bits / 4) - 1;
}
