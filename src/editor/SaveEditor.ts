// src/editor/SaveEditor.ts
import { decodeField, writeField } from '../codec/FieldCodec';
import { DecodeError, FormatError, StateError } from '../errors/SramError';
import { loadSram, saveSram } from '../io/SramFile';
import type { SramFileSystem } from '../io/SramFile';
import { silentLogger } from '../log/Logger';
import type { Logger } from '../log/Logger';
import { embedChecksum, formatChecksum, readStoredChecksum } from '../sram/Checksum';
import type { ChecksumReport } from '../sram/Checksum';
import { isCar, isMode, LEAGUES } from '../sram/LeagueInfo';
import { getField, getRecord, listRecords, raceSlotFields } from '../sram/Layout';
import { SaveImage } from '../sram/SaveImage';
import type { FieldValue, LeagueId, RaceRecord, RaceTime, SlotId } from '../sram/types';

/**
 * Ciclo de vida:
 *   unloaded ──load──▶ clean ──set──▶ dirty ──save──▶ saved
 *                                ▲                     │
 *                                └────────set──────────┘
 * Um save que falha mantém o estado anterior (o erro sobe para quem chamou).
 */
export type EditorState = 'unloaded' | 'clean' | 'dirty' | 'saved';

export interface FieldEdit {
  id: string;
  value: FieldValue;
}

export interface SaveEditorOptions {
  strict?: boolean;
  logger?: Logger;
  fs?: SramFileSystem;
}

export interface RecomputeOptions {
  /** Recalcula todas as ligas, não só as editadas (útil para reparar um save). */
  all?: boolean;
}

export class SaveEditor {
  private image: SaveImage | null = null;
  private state: EditorState = 'unloaded';
  private readonly dirty = new Set<LeagueId>();
  private source: string | null = null;

  private readonly strict: boolean;
  private readonly log: Logger;
  private readonly fs: SramFileSystem | undefined;

  constructor(options: SaveEditorOptions = {}) {
    this.strict = options.strict ?? false;
    this.log = (options.logger ?? silentLogger).child('editor');
    this.fs = options.fs;
  }

  // ===================== Estado =====================

  getState(): EditorState {
    return this.state;
  }

  /** Caminho de onde a imagem foi carregada (destino padrão do save). */
  getSource(): string | null {
    return this.source;
  }

  dirtyRecords(): LeagueId[] {
    return LEAGUES.map((l) => l.id).filter((id) => this.dirty.has(id));
  }

  // ===================== Load =====================

  load(file: string): this {
    const bytes = loadSram(file, { fs: this.fs, logger: this.log });
    return this.loadBytes(bytes, file);
  }

  /**
   * Carrega uma imagem em memória. Tamanho errado é sempre FormatError;
   * assinatura, unlocks e checksums só derrubam o load no modo estrito.
   * Nada é trocado no editor se a validação falhar.
   */
  loadBytes(bytes: Uint8Array, source: string | null = null): this {
    const image = SaveImage.fromBytes(bytes);
    this.validate(image);

    this.image = image;
    this.source = source;
    this.dirty.clear();
    this.state = 'clean';
    return this;
  }

  /** Começa de um save zerado (ver SaveImage.blank). */
  loadBlank(): this {
    this.image = SaveImage.blank();
    this.source = null;
    this.dirty.clear();
    this.state = 'clean';
    return this;
  }

  // ===================== Leitura =====================

  get(id: string): FieldValue {
    return decodeField(this.requireImage().view(), getField(id), { strict: this.strict });
  }

  getRecord(league: LeagueId, track: string, slot: SlotId): RaceRecord {
    const view = this.requireImage().view();
    const f = raceSlotFields(league, track, slot);
    const opts = { strict: this.strict };
    const car = String(decodeField(view, f.car, opts));
    const mode = String(decodeField(view, f.mode, opts));
    if (!isCar(car) || !isMode(mode)) {
      throw new DecodeError(`Registro ${league}.${track}.${slot} com carro/modo inválido`);
    }
    return {
      minutes: Number(decodeField(view, f.minutes, opts)),
      seconds: Number(decodeField(view, f.seconds, opts)),
      cents: Number(decodeField(view, f.cents, opts)),
      car,
      mode,
      display: decodeField(view, f.display, opts) === true,
    };
  }

  getUnlocks(): Record<LeagueId, boolean> {
    const flags = this.get('unlocks');
    const out = { knight: false, queen: false, king: false };
    LEAGUES.forEach((league, i) => {
      out[league.id] = Array.isArray(flags) && flags[i] === true;
    });
    return out;
  }

  // ===================== Edição =====================

  set(id: string, value: FieldValue): this {
    return this.setMany([{ id, value }]);
  }

  /**
   * Aplica várias edições de uma vez: tudo ou nada. As edições são gravadas
   * numa cópia da imagem e só copiadas de volta se todas forem válidas.
   */
  setMany(edits: readonly FieldEdit[]): this {
    const image = this.requireImage();
    if (edits.length === 0) return this;

    const scratch = image.clone();
    const touched = new Set<LeagueId>();

    for (const { id, value } of edits) {
      const field = getField(id);
      writeField(scratch.view(), field, value);
      if (field.record) touched.add(field.record);
      this.log.debug(`${id} = ${JSON.stringify(value)}`);
    }

    image.replaceWith(scratch);
    for (const id of touched) this.dirty.add(id);
    this.state = 'dirty';
    return this;
  }

  setRecord(league: LeagueId, track: string, slot: SlotId, patch: Partial<RaceRecord>): this {
    const f = raceSlotFields(league, track, slot);
    const edits: FieldEdit[] = [];
    if (patch.minutes !== undefined) edits.push({ id: f.minutes.id, value: patch.minutes });
    if (patch.seconds !== undefined) edits.push({ id: f.seconds.id, value: patch.seconds });
    if (patch.cents !== undefined) edits.push({ id: f.cents.id, value: patch.cents });
    if (patch.car !== undefined) edits.push({ id: f.car.id, value: patch.car });
    if (patch.mode !== undefined) edits.push({ id: f.mode.id, value: patch.mode });
    if (patch.display !== undefined) edits.push({ id: f.display.id, value: patch.display });
    return this.setMany(edits);
  }

  setTime(league: LeagueId, track: string, slot: SlotId, time: RaceTime): this {
    return this.setRecord(league, track, slot, {
      minutes: time.minutes,
      seconds: time.seconds,
      cents: time.cents,
    });
  }

  setUnlocks(unlocks: Partial<Record<LeagueId, boolean>>): this {
    const current = this.getUnlocks();
    const next = LEAGUES.map((l) => unlocks[l.id] ?? current[l.id]);
    return this.set('unlocks', next);
  }

  // ===================== Checksums =====================

  verify(): ChecksumReport[] {
    return this.requireImage().checksums();
  }

  /**
   * Regrava os checksums das ligas sujas (ou de todas). Uma liga cujo
   * checksum gravado muda passa a contar como suja.
   */
  recomputeChecksums(options: RecomputeOptions = {}): ChecksumReport[] {
    const image = this.requireImage();
    const view = image.view();
    const records = options.all ? listRecords() : this.dirtyRecords().map((id) => getRecord(id));
    for (const record of records) {
      const before = readStoredChecksum(view, record);
      const value = embedChecksum(view, record);
      this.log.debug(`Checksum ${record.name} League → ${formatChecksum(value)}`);
      if (value !== before) {
        this.dirty.add(record.id);
        this.state = 'dirty';
      }
    }
    return image.checksums();
  }

  // ===================== Save =====================

  /**
   * Bytes prontos para gravar: assinaturas, unlocks e padding normalizados
   * (ver SaveImage.normalize) e checksums das ligas sujas recalculados.
   */
  exportBytes(): Uint8Array {
    const image = this.requireImage();
    const fixed = image.normalize();
    if (fixed.length > 0) {
      this.log.warn(`Normalizado antes de gravar: ${fixed.join(', ')}`);
      this.state = 'dirty';
    }
    this.recomputeChecksums();
    return image.bytes();
  }

  /**
   * Recalcula checksums pendentes e grava de forma atômica em `file`
   * (ou no arquivo de origem). Só muda para `saved` se tudo deu certo.
   */
  save(file?: string): this {
    const target = file ?? this.source;
    if (target === null) {
      throw new StateError('Nenhum arquivo de destino: informe o caminho para salvar.');
    }

    const bytes = this.exportBytes();
    saveSram(target, bytes, { fs: this.fs, logger: this.log });

    this.dirty.clear();
    this.source = target;
    this.state = 'saved';
    this.log.debug(`Salvo em ${target}`);
    return this;
  }

  // ===================== Internals =====================

  private requireImage(): SaveImage {
    if (!this.image) {
      throw new StateError('Nenhum save carregado.');
    }
    return this.image;
  }

  private validate(image: SaveImage): void {
    for (const sig of image.checkSignatures()) {
      const offset = getField(sig.field).offset;
      if (sig.valid) {
        this.log.debug(`Assinatura ${sig.field} em 0x${offset.toString(16).padStart(4, '0')} OK`);
      } else {
        this.problem(`Assinatura ${sig.field} inválida em 0x${offset.toString(16).padStart(4, '0')}: ${JSON.stringify(sig.text)}`);
      }
    }

    try {
      decodeField(image.view(), getField('unlocks'), { strict: true });
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.problem(`Unlocks do Master inválidos: ${err.message}`);
    }

    for (const report of image.checksums()) {
      if (report.valid) {
        this.log.debug(`Checksum ${report.record.name} League OK [${formatChecksum(report.stored)}]`);
      } else {
        this.problem(
          `Checksum ${report.record.name} League inválido: ${formatChecksum(report.stored)}, esperado ${formatChecksum(report.expected)}`
        );
      }
    }
  }

  private problem(message: string): void {
    if (this.strict) throw new FormatError(message);
    this.log.warn(message);
  }
}
