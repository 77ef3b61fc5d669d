import { describe, it, expect } from 'vitest'
import { isRaceSlot, parseDirective, parseDirectives, parseFieldValue } from '../Directives'
import { EncodeError, LookupError } from '../../errors/SramError'
import { getField } from '../../sram/Layout'

describe('Directives', () => {
  it('reconhece prefixos de slot', () => {
    expect(isRaceSlot('knight.silence.lap')).toBe(true)
    expect(isRaceSlot('queen.white-land-ii.10')).toBe(true)
    expect(isRaceSlot('knight.silence')).toBe(false)
    expect(isRaceSlot('knight.silence.lap.cents')).toBe(false)
    expect(isRaceSlot('knight.silence.11')).toBe(false)
  })

  it('campo simples', () => {
    expect(parseDirective('knight.big-blue.3.seconds=42')).toEqual([{ id: 'knight.big-blue.3.seconds', value: 42 }])
    expect(parseDirective(' king.checksum = 0x35ED ')).toEqual([{ id: 'king.checksum', value: 0x35ed }])
    expect(parseDirective('knight.silence.1.car=Wild-Goose')).toEqual([{ id: 'knight.silence.1.car', value: 'wild-goose' }])
  })

  it('atalho de tempo preenche as partes e mostra o registro', () => {
    expect(parseDirective('queen.port-town-i.lap=0:31.07')).toEqual([
      { id: 'queen.port-town-i.lap.minutes', value: 0 },
      { id: 'queen.port-town-i.lap.seconds', value: 31 },
      { id: 'queen.port-town-i.lap.cents', value: 7 },
      { id: 'queen.port-town-i.lap.display', value: true },
    ])
  })

  it('"-" esconde o registro', () => {
    expect(parseDirective('king.fire-field.1=-')).toEqual([{ id: 'king.fire-field.1.display', value: false }])
  })

  it('várias diretivas viram uma lista só', () => {
    expect(parseDirectives(['king.fire-field.1=-', 'unlocks=queen'])).toEqual([
      { id: 'king.fire-field.1.display', value: false },
      { id: 'unlocks', value: [false, true, false] },
    ])
  })

  it('erros de sintaxe e de campo', () => {
    expect(() => parseDirective('knight.big-blue.3.seconds')).toThrow(EncodeError)
    expect(() => parseDirective('=5')).toThrow(/Diretiva inválida/)
    expect(() => parseDirective('knight.silence.1=1:75.00')).toThrow(/Tempo inválido para knight.silence.1/)
    expect(() => parseDirective('nada.disso=1')).toThrow(LookupError)
  })
})

describe('parseFieldValue', () => {
  it('flags', () => {
    const field = getField('knight.silence.1.display')
    expect(parseFieldValue(field, 'yes')).toBe(true)
    expect(parseFieldValue(field, '0')).toBe(false)
    // texto desconhecido passa adiante; o codec rejeita
    expect(parseFieldValue(field, 'talvez')).toBe('talvez')
  })

  it('números decimais e hexadecimais', () => {
    const field = getField('knight.silence.1.cents')
    expect(parseFieldValue(field, '99')).toBe(99)
    expect(parseFieldValue(field, '0x10')).toBe(16)
    expect(parseFieldValue(field, '1.5')).toBe('1.5')
  })

  it('unlocks por nome de liga', () => {
    const field = getField('unlocks')
    expect(parseFieldValue(field, 'knight,King')).toEqual([true, false, true])
    expect(parseFieldValue(field, 'none')).toEqual([false, false, false])
    expect(() => parseFieldValue(field, 'knight,diamond')).toThrow(/Liga desconhecida: "diamond"/)
  })
})
