import { describe, expect, it } from 'vitest'
import { objectToYaml } from './yaml.ts'

describe('objectToYaml', () => {
  it('should indent nested maps by two spaces by default', () => {
    expect(objectToYaml({ a: { b: 1 } })).toBe('a:\n  b: 1\n')
  })

  it('should honor a custom indent', () => {
    expect(objectToYaml({ a: { b: 1 } }, { indent: 4 })).toBe('a:\n    b: 1\n')
  })

  it('should not fold long values', () => {
    const data = 'x'.repeat(120)
    expect(objectToYaml({ data })).toBe(`data: ${data}\n`)
  })
})
