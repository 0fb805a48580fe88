import { describe, it, expect } from 'vitest'
import { selectTopK } from '@core/ml/top-k'
import { InferenceError } from '@core/errors'

const MUSHROOMS = ['agaricus', 'amanita', 'boletus']

describe('selectTopK', () => {
  it('returns the k highest scores in descending order', () => {
    const result = selectTopK([0.1, 0.7, 0.2], MUSHROOMS, 2)

    expect(result).toEqual([
      { name: 'amanita', confidence: 0.7 },
      { name: 'boletus', confidence: 0.2 },
    ])
  })

  it('clamps k to the catalog size', () => {
    const result = selectTopK([0.1, 0.7, 0.2], MUSHROOMS, 10)

    expect(result).toHaveLength(3)
    expect(result.map((p) => p.name)).toEqual(['amanita', 'boletus', 'agaricus'])
  })

  it('breaks ties by lower catalog index', () => {
    const result = selectTopK([0.5, 0.5, 0.5, 0.9], ['a', 'b', 'c', 'd'], 4)

    expect(result.map((p) => p.name)).toEqual(['d', 'a', 'b', 'c'])
  })

  it('gives the same order on repeated calls', () => {
    const scores = Float32Array.from([0.3, 0.1, 0.3, 0.2, 0.1])
    const catalog = ['a', 'b', 'c', 'd', 'e']

    const first = selectTopK(scores, catalog, 5)
    const second = selectTopK(scores, catalog, 5)

    expect(second).toEqual(first)
    expect(first.map((p) => p.name)).toEqual(['a', 'c', 'd', 'b', 'e'])
  })

  it('never returns duplicate labels', () => {
    const scores = Array.from({ length: 50 }, (_, i) => (i * 7) % 11)
    const catalog = Array.from({ length: 50 }, (_, i) => `class_${i}`)

    const names = selectTopK(scores, catalog, 20).map((p) => p.name)

    expect(new Set(names).size).toBe(20)
  })

  it('ranks NaN scores last', () => {
    const result = selectTopK([Number.NaN, 0.2, 0.1], MUSHROOMS, 3)

    expect(result.map((p) => p.name)).toEqual(['amanita', 'boletus', 'agaricus'])
  })

  it('returns an empty list for k <= 0', () => {
    expect(selectTopK([0.1, 0.7, 0.2], MUSHROOMS, 0)).toEqual([])
    expect(selectTopK([0.1, 0.7, 0.2], MUSHROOMS, -3)).toEqual([])
  })

  it('keeps float32 confidences as stored', () => {
    const scores = Float32Array.from([0.1, 0.7, 0.2])

    const [top] = selectTopK(scores, MUSHROOMS, 1)

    expect(top.name).toBe('amanita')
    expect(top.confidence).toBe(scores[1])
    expect(top.confidence).toBeCloseTo(0.7)
  })

  it('throws InferenceError when score and catalog lengths differ', () => {
    expect(() => selectTopK([0.1, 0.2], MUSHROOMS, 1)).toThrow(InferenceError)
    expect(() => selectTopK([0.1, 0.2], MUSHROOMS, 1)).toThrow(
      'Score vector has 2 entries but the catalog has 3',
    )
  })
})
