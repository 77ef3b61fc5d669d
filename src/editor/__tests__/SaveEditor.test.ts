import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { SaveEditor } from '../SaveEditor'
import { DecodeError, EncodeError, FormatError, IOError, LookupError, StateError } from '../../errors/SramError'
import { createLogger } from '../../log/Logger'
import type { LogSink } from '../../log/Logger'
import { nodeFileSystem } from '../../io/SramFile'
import { buildTestSave, testChecksumOffset, testRecordOffset } from '../../sram/TestSaveBuilder'

function captureLogger() {
  const lines: string[] = []
  const push = (m: string) => {
    lines.push(m)
  }
  const sink: LogSink = { debug: push, info: push, warn: push, error: push }
  return { lines, logger: createLogger('warn', sink) }
}

describe('SaveEditor — estados', () => {
  it('começa sem imagem e recusa leituras', () => {
    const editor = new SaveEditor()
    expect(editor.getState()).toBe('unloaded')
    expect(() => editor.get('unlocks')).toThrow(StateError)
    expect(() => editor.set('unlocks', [true, true, true])).toThrow(StateError)
  })

  it('load → clean, set → dirty', () => {
    const editor = new SaveEditor().loadBytes(buildTestSave())
    expect(editor.getState()).toBe('clean')
    expect(editor.get('knight.silence.lap.display')).toBe(false)

    editor.set('knight.silence.lap.seconds', 42)
    expect(editor.getState()).toBe('dirty')
    expect(editor.dirtyRecords()).toEqual(['knight'])
    expect(editor.get('knight.silence.lap.seconds')).toBe(42)
  })

  it('loadBlank parte do save de fábrica', () => {
    const editor = new SaveEditor().loadBlank()
    expect(editor.getState()).toBe('clean')
    expect(editor.getSource()).toBeNull()
    expect(editor.exportBytes()).toEqual(buildTestSave())
  })

  it('save sem destino lança StateError', () => {
    const editor = new SaveEditor().loadBlank()
    expect(() => editor.save()).toThrow(StateError)
    expect(editor.getState()).toBe('clean')
  })
})

describe('SaveEditor — edição', () => {
  let editor: SaveEditor

  beforeEach(() => {
    editor = new SaveEditor().loadBytes(buildTestSave())
  })

  it('setMany é tudo ou nada', () => {
    const before = editor.exportBytes()
    expect(() =>
      editor.setMany([
        { id: 'queen.big-blue.1.seconds', value: 42 },
        { id: 'queen.mute-city-ii.1.minutes', value: 10 },
      ])
    ).toThrow(LookupError)
    expect(() =>
      editor.setMany([
        { id: 'queen.mute-city-ii.1.seconds', value: 42 },
        { id: 'queen.mute-city-ii.1.minutes', value: 10 },
      ])
    ).toThrow(EncodeError)

    expect(editor.getState()).toBe('clean')
    expect(editor.dirtyRecords()).toEqual([])
    expect(editor.exportBytes()).toEqual(before)
  })

  it('setRecord e getRecord', () => {
    editor.setRecord('king', 'Red Canyon II', '3', {
      minutes: 2,
      seconds: 8,
      cents: 50,
      car: 'golden-fox',
      mode: 'practice',
      display: true,
    })
    expect(editor.getRecord('king', 'Red Canyon II', '3')).toEqual({
      minutes: 2,
      seconds: 8,
      cents: 50,
      car: 'golden-fox',
      mode: 'practice',
      display: true,
    })
    // display(1) mode(1) car(10) minutes(0010) | 0x08 | 0x50
    const at = testRecordOffset(2, 3, 2)
    expect([...editor.exportBytes().subarray(at, at + 3)]).toEqual([0xe2, 0x08, 0x50])
  })

  it('setTime mantém carro, modo e display', () => {
    editor.setTime('knight', 'Big Blue', '1', { minutes: 1, seconds: 2, cents: 3 })
    expect(editor.getRecord('knight', 'Big Blue', '1')).toEqual({
      minutes: 1,
      seconds: 2,
      cents: 3,
      car: 'blue-falcon',
      mode: 'grand-prix',
      display: false,
    })
  })

  it('unlocks ficam fora dos checksums das ligas', () => {
    editor.setUnlocks({ king: true })
    expect(editor.getUnlocks()).toEqual({ knight: false, queen: false, king: true })
    expect(editor.getState()).toBe('dirty')
    expect(editor.dirtyRecords()).toEqual([])
    expect(editor.exportBytes()[0x1fa]).toBe(0x44)

    editor.setUnlocks({ knight: true })
    expect(editor.getUnlocks()).toEqual({ knight: true, queen: false, king: true })
  })

  it('checksum editado à mão não é recalculado no export', () => {
    editor.set('knight.checksum', 0x1234)
    expect(editor.dirtyRecords()).toEqual([])
    const bytes = editor.exportBytes()
    expect([bytes[testChecksumOffset(0)], bytes[testChecksumOffset(0) + 1]]).toEqual([0x34, 0x12])
    expect(editor.verify().map((r) => r.valid)).toEqual([false, true, true])
  })
})

describe('SaveEditor — checksums', () => {
  it('export recalcula o checksum das ligas editadas', () => {
    const editor = new SaveEditor().loadBytes(buildTestSave())
    editor.set('queen.white-land-ii.lap.display', true)
    expect(editor.verify().map((r) => r.valid)).toEqual([true, false, true])

    const bytes = editor.exportBytes()
    expect(editor.verify().every((r) => r.valid)).toBe(true)
    // 0x09 → 0x89: +0x80 sobre 13805
    expect([bytes[testChecksumOffset(1)], bytes[testChecksumOffset(1) + 1]]).toEqual([0x6d, 0x36])
  })

  it('recomputeChecksums({ all }) repara um save inteiro', () => {
    const editor = new SaveEditor().loadBytes(buildTestSave({ checksums: false }))
    expect(editor.verify().some((r) => r.valid)).toBe(false)

    const reports = editor.recomputeChecksums({ all: true })
    expect(reports.map((r) => r.expected)).toEqual([13805, 13805, 13805])
    expect(reports.every((r) => r.valid)).toBe(true)
    expect(editor.getState()).toBe('dirty')
    expect(editor.dirtyRecords()).toEqual(['knight', 'queen', 'king'])
  })

  it('recompute sem mudança não suja o editor', () => {
    const editor = new SaveEditor().loadBytes(buildTestSave())
    editor.recomputeChecksums({ all: true })
    expect(editor.getState()).toBe('clean')
  })
})

describe('SaveEditor — validação no load', () => {
  it('modo tolerante: checksums errados viram warnings', () => {
    const { lines, logger } = captureLogger()
    const editor = new SaveEditor({ logger }).loadBytes(buildTestSave({ checksums: false }))
    expect(editor.getState()).toBe('clean')
    expect(lines).toEqual([
      'WARNING: Checksum Knight League inválido: 0000, esperado ED35',
      'WARNING: Checksum Queen League inválido: 0000, esperado ED35',
      'WARNING: Checksum King League inválido: 0000, esperado ED35',
    ])
  })

  it('modo tolerante: unlocks inválidos contam como nenhuma liga e o export normaliza', () => {
    const sram = buildTestSave({ unlocks: 0x13 })
    sram[0x1fb] = 0x00
    sram[0x7ff] = 0x01
    const { lines, logger } = captureLogger()
    const editor = new SaveEditor({ logger }).loadBytes(sram)
    expect(editor.getUnlocks()).toEqual({ knight: false, queen: false, king: false })
    expect(editor.getState()).toBe('clean')

    expect(editor.exportBytes()).toEqual(buildTestSave())
    expect(editor.getState()).toBe('dirty')
    expect(lines[lines.length - 1]).toBe('WARNING: Normalizado antes de gravar: unlocks, footer, padding')
    expect(() => new SaveEditor({ strict: true }).loadBytes(editor.exportBytes())).not.toThrow()
  })

  it('modo estrito: checksum errado é FormatError e nada é carregado', () => {
    const editor = new SaveEditor({ strict: true })
    expect(() => editor.loadBytes(buildTestSave({ checksums: false }))).toThrow(FormatError)
    expect(editor.getState()).toBe('unloaded')
  })

  it('modo estrito: unlocks sem espelho', () => {
    const editor = new SaveEditor({ strict: true })
    expect(() => editor.loadBytes(buildTestSave({ unlocks: 0x01 }))).toThrow(/Unlocks do Master inválidos/)
  })

  it('modo estrito: assinatura', () => {
    const sram = buildTestSave()
    sram[0x1fb] = 0x00
    expect(() => new SaveEditor({ strict: true }).loadBytes(sram)).toThrow(/Assinatura footer inválida em 0x01fb/)
  })

  it('tamanho errado falha mesmo fora do modo estrito', () => {
    expect(() => new SaveEditor().loadBytes(new Uint8Array(32768))).toThrow(FormatError)
  })

  it('modo estrito rejeita BCD inválido na leitura', () => {
    const sram = buildTestSave({ records: [{ league: 0, track: 2, slot: 0, bytes: [0x81, 0x4f, 0x00] }] })
    const editor = new SaveEditor({ strict: true }).loadBytes(sram)
    expect(() => editor.get('knight.sand-ocean.1.seconds')).toThrow(DecodeError)
    expect(new SaveEditor().loadBytes(sram).get('knight.sand-ocean.1.seconds')).toBe(55)
  })
})

describe('SaveEditor — arquivos', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fzero-editor-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('melhor volta: edita, salva, relê e o checksum confere', () => {
    const file = join(dir, 'fzero.srm')
    new SaveEditor().loadBlank().save(file)

    const editor = new SaveEditor().load(file)
    editor.setRecord('queen', 'Port Town I', 'lap', {
      minutes: 0,
      seconds: 31,
      cents: 7,
      car: 'wild-goose',
      display: true,
    })
    editor.save()
    expect(editor.getState()).toBe('saved')
    expect(editor.getSource()).toBe(file)

    const reloaded = new SaveEditor({ strict: true }).load(file)
    expect(reloaded.getRecord('queen', 'Port Town I', 'lap')).toEqual({
      minutes: 0,
      seconds: 31,
      cents: 7,
      car: 'wild-goose',
      mode: 'grand-prix',
      display: true,
    })
    expect(reloaded.verify().every((r) => r.valid)).toBe(true)

    const at = testRecordOffset(1, 1, 10)
    expect([...readFileSync(file).subarray(at, at + 3)]).toEqual([0x90, 0x31, 0x07])
  })

  it('saved → dirty ao editar de novo', () => {
    const file = join(dir, 'fzero.srm')
    const editor = new SaveEditor().loadBlank().save(file)
    editor.set('king.fire-field.1.car', 'fire-stingray')
    expect(editor.getState()).toBe('dirty')
  })

  it('falha ao gravar mantém o estado dirty', () => {
    const fs = {
      ...nodeFileSystem,
      renameSync: () => {
        throw new Error('somente leitura')
      },
    }
    const editor = new SaveEditor({ fs }).loadBlank()
    editor.set('knight.mute-city-i.1.display', true)

    expect(() => editor.save(join(dir, 'fzero.srm'))).toThrow(IOError)
    expect(editor.getState()).toBe('dirty')
    expect(editor.dirtyRecords()).toEqual(['knight'])
    expect(editor.getSource()).toBeNull()
  })
})
