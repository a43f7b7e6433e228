import {
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsPositive,
  IsString,
  ValidateBy,
  ValidationOptions,
  buildMessage,
} from 'class-validator';
import { isValidPrice } from '../entities/price-quote.entity';

/**
 * Plain object whose every value is a finite positive number.
 * class-validator has no per-value check for records.
 */
export function IsPriceMap(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isPriceMap',
      validator: {
        validate: (value: unknown): boolean =>
          typeof value === 'object' &&
          value !== null &&
          !Array.isArray(value) &&
          Object.values(value).every(isValidPrice),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must map ledger codes to positive numbers`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

// Override for one ledger code, keyed as written (RSU_AMZN, not AMZN).
// A price set for 00700 also serves a row written 700.
export class UpdatePriceDto {
  @IsString()
  @IsNotEmpty()
  code!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  price!: number;
}

export class BulkUpdatePricesDto {
  @IsObject()
  @IsPriceMap()
  prices!: Record<string, number>;
}
