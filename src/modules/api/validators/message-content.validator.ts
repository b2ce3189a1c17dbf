import {
  registerDecorator,
  type ValidationOptions,
  type ValidationArguments,
  ValidatorConstraint,
  type ValidatorConstraintInterface,
} from 'class-validator';

function isNonEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Validator for `text_content`
 * A message needs a text or an HTML body; whichever is present must be a non-empty string.
 */
@ValidatorConstraint({ name: 'hasMessageContent', async: false })
export class HasMessageContentConstraint implements ValidatorConstraintInterface {
  public validate(textContent: unknown, args: ValidationArguments): boolean {
    if (textContent !== undefined && textContent !== null) {
      return isNonEmptyString(textContent);
    }

    const message = args.object;
    return 'html_content' in message && isNonEmptyString(message.html_content);
  }

  public defaultMessage(_args: ValidationArguments): string {
    return 'either text_content or html_content is required and must be a non-empty string';
  }
}

/**
 * Decorator for the text body of a message
 */
export function HasMessageContent(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      target: object.constructor,
      propertyName,
      options: validationOptions,
      constraints: [],
      validator: HasMessageContentConstraint,
    });
  };
}
