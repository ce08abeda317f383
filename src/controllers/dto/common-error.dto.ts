import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { ErrorCode, ErrorSeverity } from "@/common/types/error-handling";

export class ErrorContextDto {
  @ApiProperty({ description: "HTTP status code", example: 400 })
  httpStatus!: number;

  @ApiProperty({ example: "/lookup" })
  path!: string;

  @ApiProperty({ example: "POST" })
  method!: string;
}

export class ErrorDetailsDto {
  @ApiProperty({ description: "Error code", enum: ErrorCode, example: ErrorCode.INVALID_INPUT })
  code!: ErrorCode;

  @ApiProperty({ description: "Human-readable error message", example: "Text to look up must not be empty" })
  message!: string;

  @ApiProperty({ description: "Error severity level", enum: ErrorSeverity, example: ErrorSeverity.LOW })
  severity!: ErrorSeverity;

  @ApiPropertyOptional({ description: "Module where the error occurred", example: "lookup" })
  module?: string;

  @ApiProperty({ example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ type: ErrorContextDto })
  context!: ErrorContextDto;
}

export class HttpErrorResponseDto {
  @ApiProperty({ description: "Success status (always false for errors)", example: false })
  success!: false;

  @ApiProperty({ type: ErrorDetailsDto })
  error!: ErrorDetailsDto;

  @ApiProperty({ example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "Request ID for tracing", example: "0f8fad5b-d9cb-469f-a165-70867728950e" })
  requestId!: string;
}
