import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { ArrayNotEmpty, IsArray, IsBoolean, IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from "class-validator";
import { Transform } from "class-transformer";

export const MAX_TEXT_LENGTH = 5000;

export class LookupOptionsDto {
  @ApiPropertyOptional({ description: "Include tone marks in the romanization", default: true })
  @IsOptional()
  @IsBoolean()
  includeTones?: boolean;

  @ApiPropertyOptional({
    description: "Add a pronunciation breakdown when the text is a single character",
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  detailedAnalysis?: boolean;

  @ApiPropertyOptional({ description: "Skip the translation cache and query providers", default: false })
  @IsOptional()
  @IsBoolean()
  bypassCache?: boolean;
}

export class LookupRequestDto extends LookupOptionsDto {
  @ApiProperty({ description: "Chinese text to look up", example: "你好", maxLength: MAX_TEXT_LENGTH })
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_TEXT_LENGTH)
  text!: string;
}

export class BatchLookupRequestDto extends LookupOptionsDto {
  @ApiPropertyOptional({
    description: "Texts to look up, one result per entry",
    type: [String],
    example: ["你好", "中国", "学习"],
  })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @MaxLength(MAX_TEXT_LENGTH, { each: true })
  texts?: string[];

  @ApiPropertyOptional({
    description: "Multi-line text, one entry per non-blank line (used when texts is absent)",
    example: "你好\n中国\n学习",
  })
  @IsOptional()
  @IsString()
  text?: string;
}

export class CharacterAnalysisDto {
  @ApiProperty({ example: "中" })
  character!: string;

  @ApiProperty({ example: true })
  isChinese!: boolean;

  @ApiProperty({ example: "zhōng" })
  romanizationWithTones!: string;

  @ApiProperty({ example: "zhong" })
  romanizationPlain!: string;

  @ApiProperty({ description: "Tone number, 5 for the neutral tone", example: 1, minimum: 1, maximum: 5 })
  toneNumber!: number;
}

export class LookupResultDto {
  @ApiProperty({ example: "你好" })
  sourceText!: string;

  @ApiProperty({ example: "nǐ hǎo" })
  romanization!: string;

  @ApiProperty({ description: "Vietnamese translation, empty when unavailable", example: "Xin chào" })
  translation!: string;

  @ApiProperty({
    description: '"cache", the name of the provider that answered, or "none"',
    example: "mymemory",
  })
  translationSource!: string;

  @ApiPropertyOptional({ example: "All translation providers failed (mymemory: HTTP 503)" })
  error?: string;

  @ApiPropertyOptional({ type: CharacterAnalysisDto })
  analysis?: CharacterAnalysisDto;
}

export class BatchLookupResponseDto {
  @ApiProperty({ type: [LookupResultDto] })
  data!: LookupResultDto[];

  @ApiProperty({ description: "Results without an error", example: 2 })
  succeeded!: number;

  @ApiProperty({ description: "Results with an error", example: 1 })
  failed!: number;
}

const isChecked = ({ value }: { value: unknown }): boolean => value === true || value === "on" || value === "true";

/**
 * Fields posted by the HTML lookup form. Checkboxes arrive as "on" or not at all.
 */
export class LookupFormDto {
  @IsOptional()
  @IsString()
  @MaxLength(MAX_TEXT_LENGTH * 10)
  text?: string;

  @IsOptional()
  @IsIn(["single", "batch"])
  mode?: "single" | "batch";

  @IsOptional()
  @Transform(isChecked)
  @IsBoolean()
  includeTones?: boolean;

  @IsOptional()
  @Transform(isChecked)
  @IsBoolean()
  detailedAnalysis?: boolean;

  @IsOptional()
  @Transform(isChecked)
  @IsBoolean()
  bypassCache?: boolean;
}
