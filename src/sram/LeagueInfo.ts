// src/sram/LeagueInfo.ts
import type { Car, LeagueId, Mode, SlotId } from './types';

export interface LeagueInfo {
  id: LeagueId;
  name: string;
  tracks: readonly string[];
}

/** Ligas na ordem em que são gravadas na SRAM. */
export const LEAGUES: readonly LeagueInfo[] = [
  {
    id: 'knight',
    name: 'Knight',
    tracks: ['Mute City I', 'Big Blue', 'Sand Ocean', 'Death Wind I', 'Silence'],
  },
  {
    id: 'queen',
    name: 'Queen',
    tracks: ['Mute City II', 'Port Town I', 'Red Canyon I', 'White Land I', 'White Land II'],
  },
  {
    id: 'king',
    name: 'King',
    tracks: ['Mute City III', 'Death Wind II', 'Port Town II', 'Red Canyon II', 'Fire Field'],
  },
] as const;

export const SLOTS: readonly SlotId[] = ['1', '2', '3', '4', '5', '6', '7', '8', '9', '10', 'lap'] as const;

/** Índice = valor armazenado nos 2 bits do carro. */
export const CARS: readonly Car[] = ['blue-falcon', 'wild-goose', 'golden-fox', 'fire-stingray'] as const;

/** Índice = bit de modo (0 = Grand Prix, 1 = Practice). */
export const MODES: readonly Mode[] = ['grand-prix', 'practice'] as const;

export const CAR_NAMES: Record<Car, string> = {
  'blue-falcon': 'Blue Falcon',
  'wild-goose': 'Wild Goose',
  'golden-fox': 'Golden Fox',
  'fire-stingray': 'Fire Stingray',
};

/** "Mute City I" → "mute-city-i" */
export function slugify(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '');
}

export function isLeagueId(value: string): value is LeagueId {
  return LEAGUES.some((l) => l.id === value);
}

export function isCar(value: string): value is Car {
  return CARS.some((c) => c === value);
}

export function isMode(value: string): value is Mode {
  return MODES.some((m) => m === value);
}
