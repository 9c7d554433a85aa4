import { describe, expect, it } from 'vitest'
import { assembleOutline, toOutlineJson } from '../../../src/lib/pipeline/outline-assembler'
import { leveledSpan, textSpan } from '../../utils/span-factory'

describe('outline assembler', () => {
  it('should order entries by page, then position, then document order', () => {
    const spans = [
      leveledSpan(textSpan('Later page', { page: 2, y: 100 }), 0, 'H1'),
      leveledSpan(textSpan('Lower', { page: 1, y: 300 }), 1, 'H2'),
      leveledSpan(textSpan('Right', { page: 1, y: 100, x: 300 }), 3, 'H2'),
      leveledSpan(textSpan('Left', { page: 1, y: 100 }), 2, 'H1'),
    ]

    const outline = assembleOutline('Report', spans)

    expect(outline.entries.map(e => e.text)).toEqual(['Left ', 'Right ', 'Lower ', 'Later page '])
  })

  it('should normalize heading text and append one trailing space', () => {
    const outline = assembleOutline('', [
      leveledSpan(textSpan('  Data \n  Sources  '), 0, 'H3'),
    ])

    expect(outline.entries).toEqual([{ level: 'H3', text: 'Data Sources ', page: 1 }])
  })

  it('should produce the serializer shape', () => {
    const outline = assembleOutline('Report', [leveledSpan(textSpan('Summary'), 0, 'H1')])

    expect(toOutlineJson(outline)).toEqual({
      title: 'Report',
      outline: [{ level: 'H1', text: 'Summary ', page: 1 }],
    })
  })

  it('should keep an empty outline empty', () => {
    expect(toOutlineJson(assembleOutline('', []))).toEqual({ title: '', outline: [] })
  })
})
