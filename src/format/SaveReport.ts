// src/format/SaveReport.ts
import type { SaveEditor } from '../editor/SaveEditor';
import { CAR_NAMES, LEAGUES, SLOTS } from '../sram/LeagueInfo';
import { prettyTime } from '../sram/RaceTime';
import type { RaceRecord } from '../sram/types';

export interface ReportOptions {
  /** Inclui slots marcados como ocultos (display = false). */
  showHidden?: boolean;
}

/** "1’23”45 * Fire Stingray" — o asterisco marca recorde feito no Practice. */
export function formatRecord(record: RaceRecord): string {
  if (!record.display) return '-';
  const mode = record.mode === 'practice' ? '*' : ' ';
  return `${prettyTime(record)} ${mode} ${CAR_NAMES[record.car]}`;
}

/**
 * Placar completo, liga por liga:
 *
 *   Knight League
 *   \tMute City I
 *   \t\t 1: 1’23”45   Blue Falcon
 *   ...
 *   Master liberado: Knight, King
 */
export function renderSave(editor: SaveEditor, options: ReportOptions = {}): string {
  const lines: string[] = [];

  for (const league of LEAGUES) {
    lines.push(`${league.name} League`);
    for (const track of league.tracks) {
      lines.push(`\t${track}`);
      SLOTS.forEach((slot) => {
        const record = editor.getRecord(league.id, track, slot);
        if (!record.display && !options.showHidden) return;
        const label = slot === 'lap' ? 'lap' : slot.padStart(2, ' ');
        lines.push(`\t\t${label}: ${formatRecord(record)}`);
      });
    }
    lines.push('');
  }

  const unlocks = editor.getUnlocks();
  const unlocked = LEAGUES.filter((l) => unlocks[l.id]).map((l) => l.name);
  lines.push(`Master liberado: ${unlocked.length ? unlocked.join(', ') : 'nenhuma liga'}`);
  return lines.join('\n');
}
