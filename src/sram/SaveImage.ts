// src/sram/SaveImage.ts
import { decodeField, writeField } from '../codec/FieldCodec';
import { FormatError } from '../errors/SramError';
import { checkRecord, embedChecksum } from './Checksum';
import type { ChecksumReport } from './Checksum';
import { LEAGUES, SLOTS } from './LeagueInfo';
import { DATA_SIZE, getField, listRecords, raceSlotFields, SIGNATURE, SRAM_SIZE } from './Layout';
import { DEFAULT_TIME } from './RaceTime';

/** Partes fixas que normalize() pode regravar, em ordem de offset. */
export type NormalizedPart = 'header' | 'unlocks' | 'footer' | 'padding';

export interface SignatureReport {
  field: 'header' | 'footer';
  text: string;
  valid: boolean;
}

/**
 * Imagem completa da SRAM (2KB). O tamanho é fixo: qualquer outro
 * comprimento é rejeitado na construção, então nunca existe imagem parcial.
 */
export class SaveImage {
  private readonly data: Uint8Array;

  private constructor(data: Uint8Array) {
    this.data = data;
  }

  /** Copia `bytes`; FormatError se o tamanho não for exatamente SRAM_SIZE. */
  static fromBytes(bytes: Uint8Array): SaveImage {
    if (bytes.length !== SRAM_SIZE) {
      throw new FormatError(
        `Tamanho de SRAM inválido: ${bytes.length} bytes (esperado ${SRAM_SIZE}).`
      );
    }
    return new SaveImage(Uint8Array.from(bytes));
  }

  /**
   * Save "de fábrica": assinaturas, todos os slots em 9'59"99 / Blue Falcon /
   * Grand Prix / ocultos, nenhum Master liberado, checksums válidos.
   */
  static blank(): SaveImage {
    const data = new Uint8Array(SRAM_SIZE);
    writeField(data, getField('header'), SIGNATURE);
    writeField(data, getField('footer'), SIGNATURE);

    for (const league of LEAGUES) {
      for (const track of league.tracks) {
        for (const slot of SLOTS) {
          const f = raceSlotFields(league.id, track, slot);
          writeField(data, f.minutes, DEFAULT_TIME.minutes);
          writeField(data, f.seconds, DEFAULT_TIME.seconds);
          writeField(data, f.cents, DEFAULT_TIME.cents);
          writeField(data, f.car, 'blue-falcon');
          writeField(data, f.mode, 'grand-prix');
          writeField(data, f.display, false);
        }
      }
    }

    writeField(data, getField('unlocks'), LEAGUES.map(() => false));
    for (const record of listRecords()) {
      embedChecksum(data, record);
    }
    return new SaveImage(data);
  }

  /** View viva do buffer: escritas aqui alteram a imagem. */
  view(): Uint8Array {
    return this.data;
  }

  /** Cópia independente dos bytes (para gravar em disco). */
  bytes(): Uint8Array {
    return Uint8Array.from(this.data);
  }

  clone(): SaveImage {
    return new SaveImage(this.bytes());
  }

  /** Substitui todo o conteúdo (mesmo tamanho) — usado para aplicar edições em lote. */
  replaceWith(other: SaveImage): void {
    this.data.set(other.data);
  }

  /**
   * Regrava o que o jogo sempre escreve do mesmo jeito: as duas assinaturas,
   * o byte de unlocks com o espelho refeito (inválido vira nenhuma liga) e os
   * zeros depois de DATA_SIZE. Os registros e checksums não são tocados.
   * Devolve as partes que mudaram.
   */
  normalize(): NormalizedPart[] {
    const before = this.bytes();
    const unlocks = getField('unlocks');
    writeField(this.data, getField('header'), SIGNATURE);
    writeField(this.data, unlocks, decodeField(this.data, unlocks));
    writeField(this.data, getField('footer'), SIGNATURE);
    this.data.fill(0, DATA_SIZE);

    const regions: Array<[NormalizedPart, number, number]> = (['header', 'unlocks', 'footer'] as const)
      .map((id): [NormalizedPart, number, number] => {
        const f = getField(id);
        return [id, f.offset, f.offset + f.width];
      });
    regions.push(['padding', DATA_SIZE, SRAM_SIZE]);

    return regions
      .filter(([, start, end]) => this.data.subarray(start, end).some((b, i) => b !== before[start + i]))
      .map(([part]) => part);
  }

  checkSignatures(): SignatureReport[] {
    return (['header', 'footer'] as const).map((field) => {
      const text = String(decodeField(this.data, getField(field)));
      return { field, text, valid: text === SIGNATURE };
    });
  }

  checksums(): ChecksumReport[] {
    return listRecords().map((record) => checkRecord(this.data, record));
  }
}
