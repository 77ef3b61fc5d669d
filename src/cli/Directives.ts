// src/cli/Directives.ts
//
// Diretivas de edição da linha de comando:
//   knight.big-blue.3.seconds=42      campo simples
//   queen.port-town-i.lap=0:31.07     atalho de tempo (minutes/seconds/cents + display)
//   king.fire-field.1=-               esconde o registro
//   unlocks=knight,king               ligas com Master liberado ("none" zera)

import { EncodeError, LookupError } from '../errors/SramError';
import type { FieldEdit } from '../editor/SaveEditor';
import { isLeagueId, LEAGUES } from '../sram/LeagueInfo';
import { getField, hasField } from '../sram/Layout';
import { parseTime } from '../sram/RaceTime';
import type { FieldDescriptor, FieldValue } from '../sram/types';

/** true se `id` é o prefixo de um slot de corrida (ex.: "knight.silence.lap"). */
export function isRaceSlot(id: string): boolean {
  return id.split('.').length === 3 && hasField(`${id}.display`);
}

export function parseDirective(text: string): FieldEdit[] {
  const eq = text.indexOf('=');
  if (eq <= 0) {
    throw new EncodeError(`Diretiva inválida: "${text}" (esperado campo=valor)`);
  }
  const id = text.slice(0, eq).trim();
  const raw = text.slice(eq + 1).trim();

  if (isRaceSlot(id)) {
    return parseSlotDirective(id, raw);
  }

  const field = getField(id);
  return [{ id, value: parseFieldValue(field, raw) }];
}

export function parseDirectives(texts: readonly string[]): FieldEdit[] {
  return texts.flatMap(parseDirective);
}

/** Converte o texto para o tipo do campo; o codec faz a validação de faixa. */
export function parseFieldValue(field: FieldDescriptor, raw: string): FieldValue {
  const enc = field.encoding;
  switch (enc.kind) {
    case 'uint':
    case 'bcd':
      return /^(0x[0-9a-f]+|\d+)$/i.test(raw) ? Number(raw) : raw;

    case 'flag': {
      const v = raw.toLowerCase();
      if (v === 'true' || v === '1' || v === 'yes') return true;
      if (v === 'false' || v === '0' || v === 'no') return false;
      return raw;
    }

    case 'enum':
      return raw.toLowerCase();

    case 'ascii':
      return raw;

    case 'mirroredFlags': {
      const names = raw.toLowerCase() === 'none' || raw === ''
        ? []
        : raw.split(',').map((s) => s.trim().toLowerCase());
      for (const name of names) {
        if (!isLeagueId(name)) {
          throw new LookupError(`Liga desconhecida: "${name}"`);
        }
      }
      return LEAGUES.map((l) => names.includes(l.id));
    }
  }
}

function parseSlotDirective(prefix: string, raw: string): FieldEdit[] {
  if (raw === '-') {
    return [{ id: `${prefix}.display`, value: false }];
  }
  const time = parseTime(raw);
  if (!time) {
    throw new EncodeError(`Tempo inválido para ${prefix}: "${raw}" (esperado M:SS.CC)`);
  }
  return [
    { id: `${prefix}.minutes`, value: time.minutes },
    { id: `${prefix}.seconds`, value: time.seconds },
    { id: `${prefix}.cents`, value: time.cents },
    { id: `${prefix}.display`, value: true },
  ];
}
