import { describe, it, expect } from 'vitest'
import { z } from 'zod'

import { validateGeographyArgs } from '../../src/schema/validators.js'

const schema = z
  .object({
    geoLevel: z.string().optional(),
    geography: z.string().optional(),
  })
  .superRefine((args, ctx) => {
    validateGeographyArgs(args, ctx)
  })

describe('validateGeographyArgs', () => {
  it('should accept a geography level alone', () => {
    expect(schema.safeParse({ geoLevel: '040' }).success).toBe(true)
  })

  it('should accept a geography name alone', () => {
    expect(schema.safeParse({ geography: 'state' }).success).toBe(true)
  })

  it('should flag a missing geography', () => {
    const result = schema.safeParse({})

    expect(result.success).toBe(false)
    expect(result.error?.issues).toEqual([
      expect.objectContaining({
        path: ['geoLevel', 'geography'],
        message:
          'No geography specified error - define geoLevel or geography arguments.',
      }),
    ])
  })

  it('should treat an empty level as missing', () => {
    expect(schema.safeParse({ geoLevel: '' }).success).toBe(false)
  })

  it('should flag both a level and a name', () => {
    const result = schema.safeParse({ geoLevel: '040', geography: 'state' })

    expect(result.success).toBe(false)
    expect(result.error?.issues[0]?.message).toBe(
      'Too many geographies specified error - define geoLevel or geography only, not both.',
    )
  })
})
