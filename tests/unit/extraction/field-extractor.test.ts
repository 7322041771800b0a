import { describe, it, expect } from 'vitest'
import {
  FieldExtractor,
  compileColumnMap,
  destinationColumns,
  toScalar,
} from '../../../src/extraction/field-extractor'
import { ConfigError, ExtractionError, TransformError } from '../../../src/utils/errors'

describe('compileColumnMap', () => {
  it('resolves shorthand and object specs', () => {
    const columns = compileColumnMap({
      license_number: 'license.number',
      name: { key: 'owner' },
      city: { column: 2 },
    })

    expect(columns.map(({ destination, reference }) => ({ destination, reference }))).toEqual([
      { destination: 'license_number', reference: 'license.number' },
      { destination: 'name', reference: 'owner' },
      { destination: 'city', reference: 2 },
    ])
  })

  it('maps array column maps by position', () => {
    const columns = compileColumnMap(['id', 'name'])
    expect(columns).toEqual([
      { destination: 'id', reference: 0 },
      { destination: 'name', reference: 1 },
    ])
    expect(destinationColumns(columns)).toEqual(['id', 'name'])
  })

  it('requires exactly one reference', () => {
    expect(() => compileColumnMap({ name: {} })).toThrow(ConfigError)
    expect(() => compileColumnMap({ name: { key: 'a', column: 1 } })).toThrow(ConfigError)
  })

  it('names the column when a transform is unknown', () => {
    expect(() => compileColumnMap({ price: { key: 'p', transform: { type: 'nope' } } })).toThrow(
      "Column 'price': Unknown transform type 'nope'"
    )
  })
})

describe('toScalar', () => {
  it('coerces raw values', () => {
    expect(toScalar('a')).toBe('a')
    expect(toScalar(3.5)).toBe(3.5)
    expect(toScalar(true)).toBe('true')
    expect(toScalar(false)).toBe('false')
    expect(toScalar({ a: 1 })).toBe('{"a":1}')
    expect(toScalar([1, 2])).toBe('[1,2]')
    expect(toScalar(undefined)).toBeNull()
    expect(toScalar(null)).toBeNull()
  })
})

describe('FieldExtractor', () => {
  it('extracts dot paths from structured records', () => {
    const extractor = new FieldExtractor(
      compileColumnMap({
        license_number: 'license.number',
        name: 'owner.names.0',
        missing: 'x.y',
      })
    )

    expect(
      extractor.extract({ license: { number: 'L1' }, owner: { names: ['Acme', 'Other'] } })
    ).toEqual({ license_number: 'L1', name: 'Acme', missing: null })
  })

  it('extracts positional rows', () => {
    const extractor = new FieldExtractor(compileColumnMap(['a', 'b', 'c']))
    expect(extractor.extract(['1', '2'])).toEqual({ a: '1', b: '2', c: null })
  })

  it('accepts integer and numeric-string references on positional rows', () => {
    const extractor = new FieldExtractor(compileColumnMap({ first: 1, second: '0' }))
    expect(extractor.extract(['x', 'y'])).toEqual({ first: 'y', second: 'x' })
  })

  it('rejects named references on positional rows', () => {
    const extractor = new FieldExtractor(compileColumnMap({ name: 'name' }))
    expect(() => extractor.extract(['Acme'])).toThrow(ConfigError)
  })

  it('applies transforms', () => {
    const extractor = new FieldExtractor(
      compileColumnMap({ price: { key: 'price', transform: { type: 'multiply', factor: 100 } } })
    )
    expect(extractor.extract({ price: '1.5' })).toEqual({ price: 150 })
    expect(extractor.extract({})).toEqual({ price: null })
  })

  it('adds the column to transform errors', () => {
    const extractor = new FieldExtractor(
      compileColumnMap({
        issued: { key: 'd', transform: { type: 'date_format', from: 'YYYY-MM-DD', to: 'MM/DD/YYYY' } },
      })
    )

    try {
      extractor.extract({ d: 'bad' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(TransformError)
      if (error instanceof TransformError) {
        expect(error.context?.column).toBe('issued')
        expect(error.transformType).toBe('date_format')
      }
    }
  })

  it('reads configured null markers as null', () => {
    const extractor = new FieldExtractor(compileColumnMap({ name: 'name', city: 'city' }), {
      nullValues: ['N/A', ''],
    })
    expect(extractor.extract({ name: 'N/A', city: '' })).toEqual({ name: null, city: null })
  })

  it('rejects records missing a mapped key under strictKeys', () => {
    const extractor = new FieldExtractor(
      compileColumnMap({ license_number: 'id', name: { key: 'business.name' } }),
      { strictKeys: true }
    )

    expect(extractor.extract({ id: 'L1', business: { name: null } })).toEqual({
      license_number: 'L1',
      name: null,
    })
    expect(() => extractor.extract({ id: 'L1', business: {} })).toThrow(
      new ExtractionError('name', 'business.name')
    )
    expect(() => extractor.extract({ id: 'L1', business: {} })).toThrow(
      "Column 'name': key 'business.name' not found in record"
    )
  })

  it('rejects short positional rows under strictKeys', () => {
    const extractor = new FieldExtractor(compileColumnMap(['a', 'b']), { strictKeys: true })

    expect(extractor.extract(['x', 'y'])).toEqual({ a: 'x', b: 'y' })
    expect(() => extractor.extract(['x'])).toThrow(ExtractionError)
  })

  it('yields nulls for records that are neither objects nor rows', () => {
    const extractor = new FieldExtractor(compileColumnMap({ name: 'name' }))
    expect(extractor.extract('Acme')).toEqual({ name: null })
  })
})
