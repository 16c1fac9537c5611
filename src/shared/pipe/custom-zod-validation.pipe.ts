import { UnprocessableEntityException } from '@nestjs/common'
import { createZodValidationPipe } from 'nestjs-zod'
import type { ZodError } from 'zod'

// Same shape as the *.error.ts constants: [{ message, path }]
const CustomZodValidationPipe = createZodValidationPipe({
  createValidationException: (error: ZodError) =>
    new UnprocessableEntityException(
      error.errors.map((issue) => ({
        message: issue.message,
        path: issue.path.join('.'),
      })),
    ),
})

export default CustomZodValidationPipe
