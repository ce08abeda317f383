import { ApiProperty } from "@nestjs/swagger";

export class CacheStatsDto {
  @ApiProperty({ example: 42 })
  entryCount!: number;

  @ApiProperty({ description: "UTF-8 size of the serialized cache", example: 1536 })
  approxSizeBytes!: number;

  @ApiProperty({ example: "/srv/app/data/translation_cache.json" })
  filePath!: string;

  @ApiProperty({ example: true })
  fileExists!: boolean;
}

export class CacheClearResponseDto {
  @ApiProperty({ description: "Number of entries removed", example: 42 })
  cleared!: number;
}
