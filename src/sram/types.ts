// src/sram/types.ts

export type LeagueId = 'knight' | 'queen' | 'king';

/** Slots por pista: 10 melhores corridas + melhor volta. */
export type SlotId = '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'lap';

export type RacePart = 'cents' | 'seconds' | 'minutes' | 'car' | 'mode' | 'display';

export type Endian = 'little' | 'big';

/** Fatia de bits dentro de uma palavra big-endian de `width` bytes (shift a partir do LSB). */
export interface BitSlice {
  readonly shift: number;
  readonly length: number;
}

export type FieldEncoding =
  | { kind: 'ascii'; expected: string }
  | { kind: 'uint'; endian: Endian }
  | { kind: 'bcd'; max: number }
  | { kind: 'enum'; values: readonly string[] }
  | { kind: 'flag' }
  | { kind: 'mirroredFlags'; count: number };

export interface FieldDescriptor {
  readonly id: string;
  readonly offset: number;
  /** Largura em bytes da fatia lida/escrita no SaveImage. */
  readonly width: number;
  readonly bits?: BitSlice;
  readonly encoding: FieldEncoding;
  /** Registro com checksum ao qual o campo pertence (se houver). */
  readonly record?: LeagueId;
}

export interface RecordDescriptor {
  readonly id: LeagueId;
  readonly name: string;
  readonly offset: number;
  readonly size: number;
  readonly checksumOffset: number;
}

export type FieldValue = number | boolean | string | readonly boolean[];

export type Car = 'blue-falcon' | 'wild-goose' | 'golden-fox' | 'fire-stingray';
export type Mode = 'grand-prix' | 'practice';

export interface RaceTime {
  minutes: number;
  seconds: number;
  cents: number;
}

/** Visão composta de um registro de corrida (3 bytes). */
export interface RaceRecord extends RaceTime {
  car: Car;
  mode: Mode;
  display: boolean;
}
