// src/sram/RaceTime.ts
import type { RaceTime } from './types';

/** Tempo "vazio" que o jogo grava nos slots nunca usados. */
export const DEFAULT_TIME: Readonly<RaceTime> = { minutes: 9, seconds: 59, cents: 99 };

const TIME_RE = /^(\d):([0-5]\d)\.(\d\d)$/;

/** "1:23.45" → { minutes: 1, seconds: 23, cents: 45 } */
export function parseTime(text: string): RaceTime | null {
  const m = TIME_RE.exec(text.trim());
  if (!m) return null;
  return { minutes: Number(m[1]), seconds: Number(m[2]), cents: Number(m[3]) };
}

/** Formato de entrada/saída da CLI: 1:23.45 */
export function formatTime(t: RaceTime): string {
  return `${t.minutes}:${pad2(t.seconds)}.${pad2(t.cents)}`;
}

/** Formato do placar do jogo: 1’23”45 */
export function prettyTime(t: RaceTime): string {
  return `${t.minutes}’${pad2(t.seconds)}”${pad2(t.cents)}`;
}

export function toCentiseconds(t: RaceTime): number {
  return 100 * (60 * t.minutes + t.seconds) + t.cents;
}

export function compareTimes(a: RaceTime, b: RaceTime): number {
  return toCentiseconds(a) - toCentiseconds(b);
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}
