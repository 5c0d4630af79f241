import { z } from 'zod'
import type { RefinementCtx } from 'zod'

type GeographyArgs = {
  geoLevel?: string
  geography?: string
}

export function validateGeographyArgs(
  args: GeographyArgs,
  ctx: RefinementCtx,
) {
  if (!args.geoLevel && !args.geography) {
    ctx.addIssue({
      path: ['geoLevel', 'geography'],
      code: z.ZodIssueCode.custom,
      message:
        'No geography specified error - define geoLevel or geography arguments.',
    })
  } else if (args.geoLevel && args.geography) {
    ctx.addIssue({
      path: ['geoLevel', 'geography'],
      code: z.ZodIssueCode.custom,
      message:
        'Too many geographies specified error - define geoLevel or geography only, not both.',
    })
  }
}
