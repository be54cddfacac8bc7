import { ValidationError } from 'class-validator';
import { ValidationHttpException } from '../ValidationHttpException';

function validationError(
  property: string,
  constraints?: Record<string, string>,
  children: ValidationError[] = [],
): ValidationError {
  const e = new ValidationError();
  e.property = property;
  e.constraints = constraints;
  e.children = children;
  return e;
}

describe('ValidationHttpException', () => {
  it('flattens nested class-validator errors into dotted paths', () => {
    const ex = ValidationHttpException.fromValidationErrors([
      validationError('age', {
        isInt: 'age must be an integer number',
        min: 'age must be greater than 0',
      }),
      validationError('address', undefined, [
        validationError('city', { maxLength: 'city must be shorter than or equal to 50 characters' }),
      ]),
    ]);

    expect(ex.getStatus()).toBe(400);
    expect(ex.getResponse()).toEqual({
      error: 'Validation failed',
      code: 'VALIDATION_FAILED',
      details: [
        { path: 'age', message: 'age must be an integer number' },
        { path: 'age', message: 'age must be greater than 0' },
        {
          path: 'address.city',
          message: 'city must be shorter than or equal to 50 characters',
        },
      ],
    });
  });
});
