// src/sram/Layout.ts
//
// Mapa da SRAM do F-Zero (SNES), 2KB:
//
//   0x000  5B   assinatura "FZERO" (header)
//   0x005  167B Knight League  (5 pistas × 11 registros × 3B + checksum 2B)
//   0x0AC  167B Queen League
//   0x153  167B King League
//   0x1FA  1B   unlocks do Master (nibble baixo + espelho no nibble alto)
//   0x1FB  5B   assinatura "FZERO" (footer)
//   0x200  ...  zeros até o fim
//
// Cada registro de corrida é lido como uma palavra de 24 bits big-endian e
// fatiado a partir do LSB: cents(8) seconds(8) minutes(4) car(2) mode(1) display(1).
// Todos os campos são gerados a partir das tabelas abaixo; nada é mutável.

import { LookupError } from '../errors/SramError';
import { CARS, LEAGUES, MODES, SLOTS, slugify } from './LeagueInfo';
import type { BitSlice, FieldDescriptor, FieldEncoding, LeagueId, RacePart, RecordDescriptor, SlotId } from './types';

export const SRAM_SIZE = 2048;
export const SIGNATURE = 'FZERO';
export const SIGNATURE_SIZE = SIGNATURE.length;

export const TRACKS_PER_LEAGUE = 5;
export const RECORDS_PER_TRACK = SLOTS.length; // 10 corridas + 1 volta
export const RECORD_SIZE = 3;
export const CHECKSUM_SIZE = 2;
export const UNLOCKS_SIZE = 1;

export const LEAGUE_DATA_SIZE = RECORD_SIZE * RECORDS_PER_TRACK * TRACKS_PER_LEAGUE; // 165
export const LEAGUE_BLOCK_SIZE = LEAGUE_DATA_SIZE + CHECKSUM_SIZE; // 167

export const HEADER_OFFSET = 0;
export const LEAGUES_OFFSET = HEADER_OFFSET + SIGNATURE_SIZE;
export const UNLOCKS_OFFSET = LEAGUES_OFFSET + LEAGUE_BLOCK_SIZE * LEAGUES.length; // 0x1FA
export const FOOTER_OFFSET = UNLOCKS_OFFSET + UNLOCKS_SIZE; // 0x1FB
export const DATA_SIZE = FOOTER_OFFSET + SIGNATURE_SIZE; // 512

/** Partes de um registro de corrida: nome, fatia de bits e encoding. */
const RACE_PARTS: ReadonlyArray<{ part: RacePart; bits: BitSlice; encoding: FieldEncoding }> = [
  { part: 'cents', bits: { shift: 0, length: 8 }, encoding: { kind: 'bcd', max: 99 } },
  { part: 'seconds', bits: { shift: 8, length: 8 }, encoding: { kind: 'bcd', max: 59 } },
  { part: 'minutes', bits: { shift: 16, length: 4 }, encoding: { kind: 'bcd', max: 9 } },
  { part: 'car', bits: { shift: 20, length: 2 }, encoding: { kind: 'enum', values: CARS } },
  { part: 'mode', bits: { shift: 22, length: 1 }, encoding: { kind: 'enum', values: MODES } },
  { part: 'display', bits: { shift: 23, length: 1 }, encoding: { kind: 'flag' } },
];

function buildRecords(): Map<LeagueId, RecordDescriptor> {
  const records = new Map<LeagueId, RecordDescriptor>();
  LEAGUES.forEach((league, i) => {
    const offset = LEAGUES_OFFSET + i * LEAGUE_BLOCK_SIZE;
    records.set(league.id, Object.freeze({
      id: league.id,
      name: league.name,
      offset,
      size: LEAGUE_DATA_SIZE,
      checksumOffset: offset + LEAGUE_DATA_SIZE,
    }));
  });
  return records;
}

function buildFields(records: Map<LeagueId, RecordDescriptor>): Map<string, FieldDescriptor> {
  const fields = new Map<string, FieldDescriptor>();
  // bits/encoding são compartilhados entre os 165 slots de cada parte: congela tudo
  const add = (f: FieldDescriptor) => {
    if (f.bits) Object.freeze(f.bits);
    if (f.encoding.kind === 'enum') Object.freeze(f.encoding.values);
    Object.freeze(f.encoding);
    fields.set(f.id, Object.freeze(f));
  };

  add({ id: 'header', offset: HEADER_OFFSET, width: SIGNATURE_SIZE, encoding: { kind: 'ascii', expected: SIGNATURE } });

  for (const league of LEAGUES) {
    const record = records.get(league.id);
    if (!record) throw new Error(`Liga sem registro: ${league.id}`);

    league.tracks.forEach((trackName, t) => {
      const track = slugify(trackName);
      SLOTS.forEach((slot, s) => {
        const offset = record.offset + (t * RECORDS_PER_TRACK + s) * RECORD_SIZE;
        for (const { part, bits, encoding } of RACE_PARTS) {
          add({
            id: `${league.id}.${track}.${slot}.${part}`,
            offset,
            width: RECORD_SIZE,
            bits,
            encoding,
            record: league.id,
          });
        }
      });
    });

    add({
      id: `${league.id}.checksum`,
      offset: record.checksumOffset,
      width: CHECKSUM_SIZE,
      encoding: { kind: 'uint', endian: 'little' },
    });
  }

  add({ id: 'unlocks', offset: UNLOCKS_OFFSET, width: UNLOCKS_SIZE, encoding: { kind: 'mirroredFlags', count: LEAGUES.length } });
  add({ id: 'footer', offset: FOOTER_OFFSET, width: SIGNATURE_SIZE, encoding: { kind: 'ascii', expected: SIGNATURE } });

  return fields;
}

const RECORDS = buildRecords();
const FIELDS = buildFields(RECORDS);

/** Descritor fixo de um campo. Lança LookupError se o id não existe. */
export function getField(id: string): FieldDescriptor {
  const field = FIELDS.get(id);
  if (!field) {
    throw new LookupError(`Campo desconhecido: "${id}"`);
  }
  return field;
}

/** Descritor do registro (liga) com checksum. */
export function getRecord(id: string): RecordDescriptor {
  for (const record of RECORDS.values()) {
    if (record.id === id) return record;
  }
  throw new LookupError(`Registro desconhecido: "${id}"`);
}

export function hasField(id: string): boolean {
  return FIELDS.has(id);
}

/** Campos em ordem de offset; `prefix` filtra por id (ex.: "knight.big-blue"). */
export function listFields(prefix = ''): FieldDescriptor[] {
  const out: FieldDescriptor[] = [];
  for (const field of FIELDS.values()) {
    if (prefix === '' || field.id === prefix || field.id.startsWith(`${prefix}.`)) {
      out.push(field);
    }
  }
  return out;
}

export function listRecords(): RecordDescriptor[] {
  return [...RECORDS.values()];
}

/** Prefixo do slot: "knight.big-blue.lap". Valida liga, pista e slot. */
export function raceSlotPrefix(league: LeagueId, track: string, slot: SlotId): string {
  const prefix = `${league}.${slugify(track)}.${slot}`;
  if (!FIELDS.has(`${prefix}.display`)) {
    throw new LookupError(`Registro de corrida desconhecido: "${prefix}"`);
  }
  return prefix;
}

/** Os seis campos de um slot, indexados pelo nome da parte. */
export function raceSlotFields(league: LeagueId, track: string, slot: SlotId): Record<RacePart, FieldDescriptor> {
  const prefix = raceSlotPrefix(league, track, slot);
  return {
    cents: getField(`${prefix}.cents`),
    seconds: getField(`${prefix}.seconds`),
    minutes: getField(`${prefix}.minutes`),
    car: getField(`${prefix}.car`),
    mode: getField(`${prefix}.mode`),
    display: getField(`${prefix}.display`),
  };
}
