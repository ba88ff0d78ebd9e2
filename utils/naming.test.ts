import { describe, expect, it } from 'vitest'
import { nm } from './naming.ts'

describe('nm', () => {
  it('should prefix resource names', () => {
    expect(nm('eks')('igw')).toBe('eks-igw')
    expect(nm('prod-eu')('public-subnet-1')).toBe('prod-eu-public-subnet-1')
  })
})
