import { BadRequestException, Injectable } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';

/**
 * Validates application commands against their class-validator DTOs.
 * Same rules as an HTTP validation pipe: unknown properties are rejected.
 */
@Injectable()
export class CommandValidator {
  async validate<T extends object>(metatype: ClassConstructor<T>, value: unknown): Promise<T> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new BadRequestException({
        error: 'Bad Request',
        message: 'Validation failed',
        details: { command: ['command must be an object'] },
      });
    }

    const object = plainToInstance(metatype, value);
    const errors = await validate(object, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });

    if (errors.length > 0) {
      throw new BadRequestException({
        error: 'Bad Request',
        message: 'Validation failed',
        details: flattenErrors(errors),
      });
    }

    return object;
  }
}

function flattenErrors(errors: ValidationError[], parent?: string): Record<string, string[]> {
  return errors.reduce<Record<string, string[]>>((acc, error) => {
    const field = parent ? `${parent}.${error.property}` : error.property;
    if (error.constraints) {
      acc[field] = Object.values(error.constraints);
    }
    if (error.children && error.children.length > 0) {
      Object.assign(acc, flattenErrors(error.children, field));
    }
    return acc;
  }, {});
}
