import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { ZodError } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';

export interface ValidationErrorItem {
  path: string;
  message: string;
}

@Injectable()
export class ZodValidationPipe<TOutput> implements PipeTransform<unknown, TOutput> {
  constructor(private readonly schema: ZodType<TOutput, ZodTypeDef, unknown>) {}

  transform(value: unknown): TOutput {
    try {
      return this.schema.parse(value);
    } catch (error) {
      if (error instanceof ZodError) {
        const errors: ValidationErrorItem[] = error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        }));
        throw new BadRequestException({
          message: 'Validation failed',
          errors,
        });
      }

      throw error;
    }
  }
}
