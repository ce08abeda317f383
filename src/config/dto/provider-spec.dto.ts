import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateBy,
  ValidateNested,
  buildMessage,
  type ValidationOptions,
} from "class-validator";
import { Type } from "class-transformer";
import type { ProviderHttpMethod, ProviderParamValue } from "@/common/types/translation";

export function isProviderParamValue(value: unknown): value is ProviderParamValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function isFlatRecord(value: unknown, isEntry: (entry: unknown) => boolean): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(entry => isEntry(entry))
  );
}

/**
 * Checks that a property is a plain object whose values pass `isEntry`.
 */
function IsFlatRecord(
  isEntry: (entry: unknown) => boolean,
  description: string,
  validationOptions?: ValidationOptions
): PropertyDecorator {
  return ValidateBy(
    {
      name: "isFlatRecord",
      validator: {
        validate: (value: unknown): boolean => isFlatRecord(value, isEntry),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must be an object of ${description} values`,
          validationOptions
        ),
      },
    },
    validationOptions
  );
}

function IsParamValue(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: "isParamValue",
      validator: {
        validate: (value: unknown): boolean => isProviderParamValue(value),
        defaultMessage: buildMessage(
          eachPrefix => `${eachPrefix}$property must be a string, number or boolean`,
          validationOptions
        ),
      },
    },
    validationOptions
  );
}

export class ProviderSuccessCheckDto {
  @IsString()
  @IsNotEmpty()
  path!: string;

  @IsParamValue()
  equals!: ProviderParamValue;
}

/**
 * Shape of one entry in the providers configuration file
 */
export class ProviderSpecDto {
  @IsString()
  @Matches(/^[a-z0-9][a-z0-9_-]*$/, { message: "name must be a lowercase identifier" })
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsBoolean()
  enabled?: boolean;

  @IsOptional()
  @IsIn(["GET", "POST"])
  method?: ProviderHttpMethod;

  @IsString()
  @Matches(/^https?:\/\//, { message: "url must start with http:// or https://" })
  url!: string;

  @IsOptional()
  @IsFlatRecord(isProviderParamValue, "string, number or boolean")
  query?: Record<string, ProviderParamValue>;

  @IsOptional()
  @IsFlatRecord(isProviderParamValue, "string, number or boolean")
  body?: Record<string, ProviderParamValue>;

  @IsOptional()
  @IsFlatRecord(entry => typeof entry === "string", "string")
  headers?: Record<string, string>;

  @IsString()
  @IsNotEmpty()
  responsePath!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => ProviderSuccessCheckDto)
  successCheck?: ProviderSuccessCheckDto;

  @IsOptional()
  @IsBoolean()
  rejectEcho?: boolean;

  @IsOptional()
  @IsInt()
  @Min(100)
  @Max(60000)
  timeoutMs?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(10)
  maxRetries?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(30000)
  retryDelayMs?: number;

  @IsOptional()
  @IsNumber()
  @Min(1)
  @Max(10)
  backoffMultiplier?: number;
}
