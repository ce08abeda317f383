import { Body, Controller, HttpCode, Post } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { InputError } from "@/common/errors";
import type { LookupOptions, LookupResult } from "@/common/types/translation";
import { LookupService } from "@/lookup/lookup.service";
import {
  BatchLookupRequestDto,
  BatchLookupResponseDto,
  LookupOptionsDto,
  LookupRequestDto,
  LookupResultDto,
} from "./dto/lookup.dto";
import { HttpErrorResponseDto } from "./dto/common-error.dto";

@ApiTags("Lookup")
@Controller("lookup")
export class LookupController extends BaseController {
  constructor(private readonly lookupService: LookupService) {
    super();
  }

  @Post()
  @HttpCode(200)
  @ApiOperation({
    summary: "Look up one text",
    description: "Returns the pinyin romanization and Vietnamese translation of the text",
  })
  @ApiResponse({ status: 200, description: "Lookup completed", type: LookupResultDto })
  @ApiResponse({ status: 400, description: "Missing or empty text", type: HttpErrorResponseDto })
  async lookup(@Body() body: LookupRequestDto): Promise<LookupResult> {
    return this.executeOperation(() => this.lookupService.lookup(body.text, this.toOptions(body)), "lookup");
  }

  @Post("batch")
  @HttpCode(200)
  @ApiOperation({
    summary: "Look up several texts",
    description:
      "Accepts either an array of texts or multi-line text. Returns one result per entry in input order; " +
      "entries that fail carry an error instead of failing the request.",
  })
  @ApiResponse({ status: 200, description: "Batch completed", type: BatchLookupResponseDto })
  @ApiResponse({ status: 400, description: "No texts, or too many texts", type: HttpErrorResponseDto })
  async lookupBatch(@Body() body: BatchLookupRequestDto): Promise<BatchLookupResponseDto> {
    return this.executeOperation(
      async () => {
        const texts = body.texts ?? this.lookupService.parseBatchInput(body.text ?? "");
        if (texts.length === 0) {
          throw new InputError("Provide texts or at least one non-blank line of text");
        }

        const data = await this.lookupService.lookupBatch(texts, this.toOptions(body));
        const failed = data.filter(result => result.error !== undefined).length;

        this.logger.log(`Batch lookup: ${data.length} texts, ${failed} failed`);

        return { data, succeeded: data.length - failed, failed };
      },
      "lookupBatch",
      { performanceThreshold: 10000 }
    );
  }

  private toOptions(body: LookupOptionsDto): LookupOptions {
    return {
      includeTones: body.includeTones,
      detailedAnalysis: body.detailedAnalysis,
      bypassCache: body.bypassCache,
    };
  }
}
