// src/sram/TestSaveBuilder.ts
// Gera imagens de SRAM sintéticas para os testes, byte a byte, sem passar
// pelo codec (assim os testes não validam o codec com ele mesmo).
//
// Layout: "FZERO" | 3 × (165B registros + 2B checksum LE) | unlocks | "FZERO" | zeros

export const TEST_SRAM_SIZE = 2048;

const LEAGUE_BASE = 5;
const LEAGUE_STRIDE = 167;
const LEAGUE_DATA = 165;

/** Registro "vazio" do jogo: 9'59"99, Blue Falcon, Grand Prix, oculto. */
export const EMPTY_RECORD: readonly number[] = [0x09, 0x59, 0x99];

export interface TestRecord {
  league: 0 | 1 | 2; // knight, queen, king
  track: number; // 0..4
  slot: number; // 0..9 corridas, 10 = volta
  bytes: readonly number[];
}

export interface TestSaveOptions {
  records?: TestRecord[];
  unlocks?: number;
  /** false = deixa os checksums como 0x0000 */
  checksums?: boolean;
  size?: number;
}

export function testRecordOffset(league: number, track: number, slot: number): number {
  return LEAGUE_BASE + league * LEAGUE_STRIDE + (track * 11 + slot) * 3;
}

export function testChecksumOffset(league: number): number {
  return LEAGUE_BASE + league * LEAGUE_STRIDE + LEAGUE_DATA;
}

export function buildTestSave({
  records = [],
  unlocks = 0x00,
  checksums = true,
  size = TEST_SRAM_SIZE,
}: TestSaveOptions = {}): Uint8Array {
  const sram = new Uint8Array(Math.max(size, 512));
  const sig = [0x46, 0x5a, 0x45, 0x52, 0x4f]; // 'FZERO'

  sram.set(sig, 0);
  for (let league = 0; league < 3; league++) {
    for (let track = 0; track < 5; track++) {
      for (let slot = 0; slot < 11; slot++) {
        sram.set(EMPTY_RECORD, testRecordOffset(league, track, slot));
      }
    }
  }
  for (const r of records) {
    sram.set(r.bytes, testRecordOffset(r.league, r.track, r.slot));
  }

  if (checksums) {
    for (let league = 0; league < 3; league++) {
      const start = LEAGUE_BASE + league * LEAGUE_STRIDE;
      let sum = 0;
      for (let i = start; i < start + LEAGUE_DATA; i++) sum += sram[i];
      const at = testChecksumOffset(league);
      sram[at] = sum & 0xff; // little-endian
      sram[at + 1] = (sum >> 8) & 0xff;
    }
  }

  sram[0x1fa] = unlocks & 0xff;
  sram.set(sig, 0x1fb);

  return size === sram.length ? sram : sram.slice(0, size);
}
