import { ApiProperty, ApiPropertyOptional, getSchemaPath } from "@nestjs/swagger";

export class HealthCacheDto {
  @ApiProperty({ example: 42 })
  entryCount!: number;

  @ApiProperty({ example: true })
  fileExists!: boolean;
}

export class HealthProviderStatsDto {
  @ApiProperty({ description: "Attempts made, retries included", example: 12 })
  totalAttempts!: number;

  @ApiProperty({ description: "Operations that eventually succeeded", example: 10 })
  successfulRetries!: number;

  @ApiProperty({ description: "Operations that failed after their last attempt", example: 1 })
  failedRetries!: number;

  @ApiProperty({ description: "Mean duration of successful operations in ms", example: 420 })
  averageRetryTime!: number;

  @ApiPropertyOptional({ description: "Epoch ms of the last completed operation", example: 1703123456789 })
  lastRetryTime?: number;
}

export class HealthResponseDto {
  @ApiProperty({ enum: ["healthy", "degraded"], example: "healthy" })
  status!: "healthy" | "degraded";

  @ApiProperty({ example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "Seconds since the service started", example: 3600 })
  uptime!: number;

  @ApiProperty({ description: "Active translation providers in chain order", example: ["mymemory", "lingva"] })
  providers!: string[];

  @ApiProperty({ type: HealthCacheDto })
  cache!: HealthCacheDto;

  @ApiProperty({
    description: "Translation attempts per provider since startup",
    type: "object",
    additionalProperties: { $ref: getSchemaPath(HealthProviderStatsDto) },
  })
  providerStats!: Record<string, HealthProviderStatsDto>;
}
